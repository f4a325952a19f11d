// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import {
  DomainRankEntry,
  MeasurementEvent,
  MetricName,
  MetricPoint,
  ReachabilityDay,
  ReachabilityTool,
  StoredMetricPoint,
} from './types';

/**
 * Store read contract: exposed to the Analytics and Age-Gate domains.
 * All range bounds are inclusive; results come back ascending.
 */
export interface TimeSeriesReader {
  queryPoints(country: string, metric: MetricName, from: Date, to: Date): Promise<MetricPoint[]>;
  /** The first `limit` entries by rank, optionally only those in `category`. */
  queryRankSnapshot(country: string, date: string, limit: number, category?: string): Promise<DomainRankEntry[]>;
  listSnapshotDates(country: string, since?: string, until?: string): Promise<string[]>;
  latestSnapshotDate(country: string): Promise<string | null>;
}

/**
 * Store write contract: exposed to the Ingestion domain.
 */
export interface TimeSeriesWriter {
  upsertPoints(points: StoredMetricPoint[]): Promise<number>;
  replaceRankSnapshot(country: string, date: string, entries: RankInput[]): Promise<number>;
}

/**
 * Daily OONI counts per tool, kept beside the ok-rate metric points.
 */
export interface ReachabilityStore {
  upsertDays(days: ReachabilityDay[]): Promise<number>;
  /** Inclusive YYYY-MM-DD bounds, ascending by date. */
  queryDays(country: string, tool: ReachabilityTool, since: string, until: string): Promise<ReachabilityDay[]>;
}

export interface RankInput {
  domain: string;
  category: string | null;
}

export interface EventRegistry {
  list(): readonly MeasurementEvent[];
  resolve(slug: string): MeasurementEvent;
}
