// ──────────────────────────────────────────
// Ingestion: upstream payload normalization
// ──────────────────────────────────────────
// Upstream providers return several shapes for the same data. Each parser
// accepts all known shapes and drops rows it cannot read.

import { RankInput } from '../../shared/contracts';
import { ValidationError } from '../../shared/errors';

export interface SeriesValue {
  timestamp: string;
  value: number;
}

export interface ReachabilityRow {
  date: string;
  ok: number;
  measurements: number;
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Any parseable instant → canonical ISO-8601 UTC, else null. */
export function toIsoTimestamp(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const t = new Date(value);
  return isNaN(t.getTime()) ? null : t.toISOString();
}

function zipSeries(timestamps: unknown, values: unknown): SeriesValue[] {
  if (!Array.isArray(timestamps) || !Array.isArray(values)) return [];
  const out: SeriesValue[] = [];
  const n = Math.min(timestamps.length, values.length);
  for (let i = 0; i < n; i++) {
    const timestamp = toIsoTimestamp(timestamps[i]);
    const value = toNumber(values[i]);
    if (timestamp !== null && value !== null) out.push({ timestamp, value });
  }
  return out;
}

function rowValue(row: Json): unknown {
  if (row.value !== undefined && row.value !== null) return row.value;
  if (isRecord(row.requests)) return row.requests.normalized ?? row.requests.value;
  if (isRecord(row.bitrate)) return row.bitrate.value;
  return undefined;
}

/**
 * Radar time series. Accepted shapes, in order:
 *   result.main.{timestamps, values}
 *   result.{timestamps, values}
 *   result.series | result.timeseries: [{ t|ts|time|timestamp, value | requests.normalized | bitrate.value }]
 */
export function parseTimeseriesResult(result: unknown): SeriesValue[] {
  if (!isRecord(result)) return [];

  const main = result.main;
  if (isRecord(main) && 'timestamps' in main && 'values' in main) {
    return zipSeries(main.timestamps, main.values);
  }
  if ('timestamps' in result && 'values' in result) {
    return zipSeries(result.timestamps, result.values);
  }

  for (const key of ['series', 'timeseries']) {
    const rows = result[key];
    if (!Array.isArray(rows)) continue;
    const out: SeriesValue[] = [];
    for (const row of rows) {
      if (!isRecord(row)) continue;
      const timestamp = toIsoTimestamp(row.t ?? row.ts ?? row.time ?? row.timestamp);
      const value = toNumber(rowValue(row));
      if (timestamp !== null && value !== null) out.push({ timestamp, value });
    }
    if (out.length > 0) return out;
  }
  return [];
}

/** Radar ranking: result.top | result.items, in upstream rank order. */
export function parseTopDomains(result: unknown): RankInput[] {
  if (!isRecord(result)) {
    throw new ValidationError('Ranking payload is not an object');
  }
  const rows = Array.isArray(result.top) ? result.top : Array.isArray(result.items) ? result.items : [];

  const ranked: { rank: number; entry: RankInput }[] = [];
  rows.forEach((row, index) => {
    if (!isRecord(row) || typeof row.domain !== 'string' || row.domain === '') return;
    const rank = toNumber(row.rank) ?? index + 1;
    const first = Array.isArray(row.categories) ? row.categories[0] : undefined;
    const category = isRecord(first) && typeof first.name === 'string' ? first.name : null;
    ranked.push({ rank, entry: { domain: row.domain, category } });
  });

  return ranked.sort((a, b) => a.rank - b.rank).map((r) => r.entry);
}

/** OONI aggregation rows: payload.result | results | data | items. */
export function parseReachabilityRows(payload: unknown): ReachabilityRow[] {
  if (!isRecord(payload)) return [];
  const key = ['result', 'results', 'data', 'items'].find((k) => Array.isArray(payload[k]));
  const rows = key ? payload[key] : [];
  if (!Array.isArray(rows)) return [];

  const out: ReachabilityRow[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const startTime = typeof row.measurement_start_time === 'string' ? row.measurement_start_time.slice(0, 10) : null;
    const day = row.bucket_date ?? row.measurement_start_day ?? startTime;
    if (typeof day !== 'string' || day === '') continue;

    out.push({
      date: day.slice(0, 10),
      ok: toNumber(row.ok_count ?? row.confirmed_count) ?? 0,
      measurements: toNumber(row.measurement_count ?? row.total) ?? 0,
    });
  }
  return out;
}
