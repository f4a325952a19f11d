import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Knex } from 'knex';
import { createTestDb, fakeFetch, jsonResponse } from '../../../__tests__/fixtures';
import { InvalidArgumentError, NotConfiguredError } from '../../../shared/errors';
import { ReachabilityRepo } from '../../storage/reachability.repo';
import { TimeSeriesRepo } from '../../storage/time-series.repo';
import { CloudflareRadarClient } from '../adapters/cloudflare';
import { FetchResponseLike } from '../adapters/http-client';
import { OoniClient } from '../adapters/ooni';
import { IngestionRunRepo } from '../ingestion-run.repo';
import { IngestionService } from '../ingestion.service';

const NOW = new Date('2025-08-01T00:00:00.000Z');
const RANGE = [new Date('2025-07-01T00:00:00Z'), new Date('2025-08-02T00:00:00Z')] as const;

type Routes = Record<string, (url: string) => FetchResponseLike>;

const radarSeries = (timestamps: string[], values: number[]) => () =>
  jsonResponse({ success: true, result: { main: { timestamps, values } } });

describe('IngestionService', () => {
  let db: Knex;
  let store: TimeSeriesRepo;
  let reachability: ReachabilityRepo;

  function service(routes: Routes, apiToken: string | undefined = 'test-token') {
    const upstream = fakeFetch(routes);
    const retry = { maxAttempts: 1, backoffMs: 0 };
    const cloudflare = new CloudflareRadarClient({
      apiBase: 'https://radar.test/client/v4',
      apiToken,
      retry,
      fetchFn: upstream.fn,
      now: () => NOW,
    });
    const ooni = new OoniClient({ apiBase: 'https://ooni.test/api/v1', retry, fetchFn: upstream.fn, now: () => NOW });
    const ingestion = new IngestionService(store, reachability, new IngestionRunRepo(db), cloudflare, ooni, {
      lookbackDays: 30,
      topDays: 2,
      topLimit: 100,
      now: () => NOW,
    });
    return { ingestion, upstream };
  }

  beforeEach(async () => {
    db = await createTestDb();
    store = new TimeSeriesRepo(db);
    reachability = new ReachabilityRepo(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('stores http series points and records a completed run', async () => {
    const { ingestion } = service({
      '/radar/http/timeseries': radarSeries(['2025-07-30T00:00:00Z', '2025-07-31T00:00:00Z'], [0.4, 0.6]),
    });

    const run = await ingestion.ingest({ kind: 'http', country: 'gb' });

    expect(run).toMatchObject({ source: 'cloudflare', kind: 'http', country: 'GB', status: 'completed', points: 2, error: null });
    expect(run.completed_at).not.toBeNull();
    const points = await store.queryPoints('GB', 'http_requests_norm', RANGE[0], RANGE[1]);
    expect(points.map((p) => p.value)).toEqual([0.4, 0.6]);
  });

  it('ingests both layer-3 directions', async () => {
    const { ingestion, upstream } = service({
      '/radar/attacks/layer3/timeseries': radarSeries(['2025-07-31T00:00:00Z'], [1024]),
    });

    const run = await ingestion.ingest({ kind: 'l3', country: 'GB', days: 7 });

    expect(run.points).toBe(2);
    expect(upstream.calls.map((u) => new URL(u).searchParams.get('direction'))).toEqual(['target', 'origin']);
    await expect(store.queryPoints('GB', 'l3_bytes_target', RANGE[0], RANGE[1])).resolves.toHaveLength(1);
    await expect(store.queryPoints('GB', 'l3_bytes_origin', RANGE[0], RANGE[1])).resolves.toHaveLength(1);
  });

  it('replaces the snapshot for a requested top-domains date', async () => {
    const { ingestion } = service({
      '/radar/ranking/top': () =>
        jsonResponse({
          success: true,
          result: { top: [{ rank: 1, domain: 'google.com' }, { rank: 2, domain: 'www.reddit.com' }] },
        }),
    });

    const run = await ingestion.ingest({ kind: 'top', country: 'GB', date: '2025-07-25' });

    expect(run.points).toBe(2);
    const snapshot = await store.queryRankSnapshot('GB', '2025-07-25', 10);
    expect(snapshot.map((e) => [e.rank, e.domain])).toEqual([
      [1, 'google.com'],
      [2, 'www.reddit.com'],
    ]);
  });

  it('walks back over recent days and skips empty upstream snapshots', async () => {
    const { ingestion, upstream } = service({
      'date=2025-07-31': () => jsonResponse({ success: true, result: { top: [{ rank: 1, domain: 'bbc.co.uk' }] } }),
      '/radar/ranking/top': () => jsonResponse({ success: true, result: { top: [] } }),
    });

    const run = await ingestion.ingest({ kind: 'top', country: 'GB' });

    expect(run.points).toBe(1);
    expect(upstream.calls.map((u) => new URL(u).searchParams.get('date'))).toEqual(['2025-08-01', '2025-07-31']);
    await expect(store.listSnapshotDates('GB')).resolves.toEqual(['2025-07-31']);
  });

  it('stores one ok-rate series and the raw daily counts per reachability tool', async () => {
    const { ingestion, upstream } = service({
      '/aggregation': () =>
        jsonResponse({ result: [{ measurement_start_day: '2025-07-31', ok_count: 9, measurement_count: 10 }] }),
    });

    const run = await ingestion.ingest({ kind: 'reachability', country: 'GB' });

    expect(run).toMatchObject({ source: 'ooni', points: 3 });
    expect(upstream.calls).toHaveLength(3);
    for (const metric of ['ooni_ok_rate_tor', 'ooni_ok_rate_snowflake', 'ooni_ok_rate_psiphon'] as const) {
      const points = await store.queryPoints('GB', metric, RANGE[0], RANGE[1]);
      expect(points.map((p) => [p.timestamp, p.value])).toEqual([['2025-07-31T00:00:00.000Z', 0.9]]);
    }
    await expect(reachability.queryDays('GB', 'psiphon', '2025-07-01', '2025-08-01')).resolves.toEqual([
      { country: 'GB', tool: 'psiphon', date: '2025-07-31', ok: 9, tests: 10, okRate: 0.9 },
    ]);
  });

  it('marks the run failed and rethrows when the upstream call fails', async () => {
    const { ingestion } = service({}, undefined);

    await expect(ingestion.ingest({ kind: 'bots', country: 'GB' })).rejects.toBeInstanceOf(NotConfiguredError);

    const [run] = await ingestion.listRuns('GB');
    expect(run).toMatchObject({ kind: 'bots', status: 'failed', points: 0, error: 'CLOUDFLARE_API_TOKEN is not set' });
  });

  it('validates arguments before recording a run', async () => {
    const { ingestion } = service({});

    await expect(ingestion.ingest({ kind: 'http', country: 'G1' })).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(ingestion.ingest({ kind: 'top', country: 'GB', date: '2025-13-01' })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    await expect(ingestion.ingest({ kind: 'http', country: 'GB', days: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(ingestion.ingest({ kind: 'http', country: 'GB', days: 100_000_000 })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    await expect(ingestion.listRuns()).resolves.toEqual([]);
  });

  it('keeps going when one kind fails during ingestAll', async () => {
    const { ingestion } = service({
      '/radar/http/timeseries': () => jsonResponse({ success: false }, 500),
      '/aggregation': () => jsonResponse({ result: [] }),
    });

    const summary = await ingestion.ingestAll('gb', ['http', 'reachability']);

    expect(summary.country).toBe('GB');
    expect(summary.runs.map((r) => [r.kind, r.status])).toEqual([['reachability', 'completed']]);
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0]?.kind).toBe('http');
    expect(summary.failures[0]?.error).toMatch(/HTTP 500$/);
  });
});
