// ──────────────────────────────────────────
// Ingestion: Core service, one entry point per ingest kind
// ──────────────────────────────────────────

import { ReachabilityStore, TimeSeriesWriter } from '../../shared/contracts';
import { errorMessage } from '../../shared/errors';
import { addDays, parseCountry, parseDate, parseDayCount, toDateString } from '../../shared/validate';
import {
  INGEST_KINDS,
  IngestKind,
  IngestionRun,
  L3Direction,
  REACHABILITY_TOOLS,
  Source,
  StoredMetricPoint,
} from '../../shared/types';
import { CloudflareRadarClient, SeriesRequest } from './adapters/cloudflare';
import { OoniClient, reachabilityMetric } from './adapters/ooni';
import { IngestionRunRepo } from './ingestion-run.repo';

const L3_DIRECTIONS: readonly L3Direction[] = ['target', 'origin'];

export interface IngestionOptions {
  lookbackDays: number;
  topDays: number;
  topLimit: number;
  now?: () => Date;
}

export interface IngestRequest {
  kind: IngestKind;
  country: string;
  days?: number;
  /** `top` only: a single snapshot date instead of the last `topDays` days. */
  date?: string;
}

export interface IngestSummary {
  country: string;
  runs: IngestionRun[];
  failures: { kind: IngestKind; error: string }[];
}

function sourceFor(kind: IngestKind): Source {
  return kind === 'reachability' ? 'ooni' : 'cloudflare';
}

export class IngestionService {
  private now: () => Date;

  constructor(
    private store: TimeSeriesWriter,
    private reachability: ReachabilityStore,
    private runRepo: IngestionRunRepo,
    private cloudflare: CloudflareRadarClient,
    private ooni: OoniClient,
    private options: IngestionOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Runs one kind; the run is recorded as failed and the error rethrown on failure. */
  async ingest(req: IngestRequest): Promise<IngestionRun> {
    const country = parseCountry(req.country);
    const date = req.date ? parseDate(req.date) : undefined;
    const days = parseDayCount(req.days ?? this.options.lookbackDays, 'days');
    const runId = await this.runRepo.start({ source: sourceFor(req.kind), kind: req.kind, country });

    try {
      const points = await this.collect(req.kind, country, days, date);
      await this.runRepo.complete(runId, points);
      console.log(`[Ingestion] ${req.kind} ${country}: ${points} records`);
    } catch (err) {
      const message = errorMessage(err);
      await this.runRepo.fail(runId, message);
      console.error(`[Ingestion] ${req.kind} ${country} failed:`, message);
      throw err;
    }

    const run = await this.runRepo.findById(runId);
    if (!run) {
      throw new Error(`Ingestion run ${runId} disappeared`);
    }
    return run;
  }

  /** Every kind for one country; a failing kind does not stop the others. */
  async ingestAll(country: string, kinds: readonly IngestKind[] = INGEST_KINDS): Promise<IngestSummary> {
    const summary: IngestSummary = { country: parseCountry(country), runs: [], failures: [] };
    for (const kind of kinds) {
      try {
        summary.runs.push(await this.ingest({ kind, country: summary.country }));
      } catch (err) {
        summary.failures.push({ kind, error: errorMessage(err) });
      }
    }
    return summary;
  }

  async listRuns(country?: string): Promise<IngestionRun[]> {
    return this.runRepo.listRecent(country ? parseCountry(country) : undefined);
  }

  private async collect(kind: IngestKind, country: string, days: number, date?: string): Promise<number> {
    switch (kind) {
      case 'http':
        return this.collectSeries({ kind: 'http' }, country, days);
      case 'bots':
        return this.collectSeries({ kind: 'bots' }, country, days);
      case 'l3': {
        let total = 0;
        for (const direction of L3_DIRECTIONS) {
          total += await this.collectSeries({ kind: 'l3', direction }, country, days);
        }
        return total;
      }
      case 'top':
        return this.collectTopDomains(country, date);
      case 'reachability':
        return this.collectReachability(country, days);
    }
  }

  private async collectSeries(req: SeriesRequest, country: string, days: number): Promise<number> {
    const { metric, points } = await this.cloudflare.fetchSeries(req, country, days);
    const rows: StoredMetricPoint[] = points.map((p) => ({
      country,
      metric,
      timestamp: p.timestamp,
      value: p.value,
      source: 'cloudflare',
      kind: req.kind,
    }));
    return this.store.upsertPoints(rows);
  }

  private async collectTopDomains(country: string, date?: string): Promise<number> {
    const today = this.now();
    const dates = date
      ? [date]
      : Array.from({ length: this.options.topDays }, (_, i) => toDateString(addDays(today, -i)));

    let total = 0;
    for (const day of dates) {
      const entries = await this.cloudflare.fetchTopDomains(country, day, this.options.topLimit);
      if (entries.length === 0) continue;
      total += await this.store.replaceRankSnapshot(country, day, entries);
    }
    return total;
  }

  /** Raw daily counts, plus the ok rate as a metric point for window analytics. */
  private async collectReachability(country: string, days: number): Promise<number> {
    let total = 0;
    for (const tool of REACHABILITY_TOOLS) {
      const counts = await this.ooni.fetchDailyCounts(tool, country, days);
      await this.reachability.upsertDays(counts);
      total += await this.store.upsertPoints(
        counts.map((d) => ({
          country,
          metric: reachabilityMetric(tool),
          timestamp: `${d.date}T00:00:00.000Z`,
          value: d.okRate,
          source: 'ooni',
          kind: 'reachability',
        }))
      );
    }
    return total;
  }
}
