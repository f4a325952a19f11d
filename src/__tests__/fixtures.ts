// ──────────────────────────────────────────
// Test fixtures: in-memory store, SQLite-backed Knex, fake fetch
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { vi } from 'vitest';
import { AppConfig, loadConfig } from '../config';
import { migrateLatest } from '../db/migrations';
import { FetchFn, FetchResponseLike } from '../domains/ingestion/adapters/http-client';
import { RankInput, TimeSeriesReader, TimeSeriesWriter } from '../shared/contracts';
import { DomainRankEntry, MetricName, MetricPoint, StoredMetricPoint } from '../shared/types';

export class MemoryStore implements TimeSeriesReader, TimeSeriesWriter {
  points: MetricPoint[] = [];
  ranks: DomainRankEntry[] = [];
  queryCalls = 0;

  addPoints(country: string, metric: MetricName, values: [string, number][]): void {
    for (const [timestamp, value] of values) {
      this.points.push({ country, metric, timestamp: new Date(timestamp).toISOString(), value });
    }
  }

  addSnapshot(country: string, date: string, domains: string[], categories: (string | null)[] = []): void {
    domains.forEach((domain, i) =>
      this.ranks.push({ country, date, rank: i + 1, domain, category: categories[i] ?? null })
    );
  }

  async upsertPoints(points: StoredMetricPoint[]): Promise<number> {
    for (const p of points) {
      this.points = this.points.filter(
        (q) => !(q.country === p.country && q.metric === p.metric && q.timestamp === p.timestamp)
      );
      this.points.push({ country: p.country, metric: p.metric, timestamp: p.timestamp, value: p.value });
    }
    return points.length;
  }

  async replaceRankSnapshot(country: string, date: string, entries: RankInput[]): Promise<number> {
    this.ranks = this.ranks.filter((r) => !(r.country === country && r.date === date));
    entries.forEach((e, i) => this.ranks.push({ country, date, rank: i + 1, domain: e.domain, category: e.category }));
    return entries.length;
  }

  async queryPoints(country: string, metric: MetricName, from: Date, to: Date): Promise<MetricPoint[]> {
    this.queryCalls++;
    return this.points
      .filter((p) => p.country === country && p.metric === metric)
      .filter((p) => p.timestamp >= from.toISOString() && p.timestamp <= to.toISOString())
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  async queryRankSnapshot(country: string, date: string, limit: number, category?: string): Promise<DomainRankEntry[]> {
    return this.ranks
      .filter((r) => r.country === country && r.date === date && (!category || r.category === category))
      .sort((a, b) => a.rank - b.rank)
      .slice(0, limit);
  }

  async listSnapshotDates(country: string, since?: string, until?: string): Promise<string[]> {
    const dates = new Set(
      this.ranks
        .filter((r) => r.country === country)
        .filter((r) => (!since || r.date >= since) && (!until || r.date <= until))
        .map((r) => r.date)
    );
    return Array.from(dates).sort();
  }

  async latestSnapshotDate(country: string): Promise<string | null> {
    const dates = await this.listSnapshotDates(country);
    return dates[dates.length - 1] ?? null;
  }
}

export async function createTestDb(): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
  });
  await migrateLatest(db);
  return db;
}

export function testConfig(env: Record<string, string> = {}): Readonly<AppConfig> {
  return loadConfig({
    CLOUDFLARE_API_TOKEN: 'test-token',
    CLOUDFLARE_API_BASE: 'https://radar.test/client/v4',
    OONI_API_BASE: 'https://ooni.test/api/v1',
    INGEST_BACKOFF_MS: '0',
    ...env,
  });
}

export function jsonResponse(body: unknown, status = 200): FetchResponseLike {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

/**
 * Fake fetch: the first route whose key is a substring of the URL answers.
 * Every requested URL is recorded in `calls`.
 */
export function fakeFetch(routes: Record<string, (url: string) => FetchResponseLike>) {
  const calls: string[] = [];
  const fn = vi.fn<FetchFn>(async (url: string) => {
    calls.push(url);
    const key = Object.keys(routes).find((k) => url.includes(k));
    const handler = key ? routes[key] : undefined;
    return handler ? handler(url) : jsonResponse({ success: false, errors: ['no route'] }, 404);
  });
  return { fn, calls };
}
