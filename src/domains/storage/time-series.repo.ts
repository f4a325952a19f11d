// ──────────────────────────────────────────
// Storage: Time-series repository (metric points + rank snapshots)
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { RankInput, TimeSeriesReader, TimeSeriesWriter } from '../../shared/contracts';
import { normalizeDomain } from '../../shared/domain-name';
import { DomainRankEntry, MetricName, MetricPoint, StoredMetricPoint, isMetricName } from '../../shared/types';

const UPSERT_CHUNK = 500;

interface MetricPointRow {
  country: string;
  metric: string;
  ts: string;
  value: number | string;
}

interface DomainRankRow {
  country: string;
  date: string;
  rank: number | string;
  domain: string;
  category: string | null;
}

export class TimeSeriesRepo implements TimeSeriesReader, TimeSeriesWriter {
  constructor(private db: Knex) {}

  async upsertPoints(points: StoredMetricPoint[]): Promise<number> {
    if (points.length === 0) return 0;

    const ingestedAt = new Date().toISOString();
    const rows = points.map((p) => ({
      country: p.country.toUpperCase(),
      metric: p.metric,
      ts: p.timestamp,
      value: p.value,
      source: p.source,
      kind: p.kind,
      ingested_at: ingestedAt,
    }));

    await this.db.transaction(async (trx) => {
      for (let i = 0; i < rows.length; i += UPSERT_CHUNK) {
        await trx('metric_points')
          .insert(rows.slice(i, i + UPSERT_CHUNK))
          .onConflict(['country', 'metric', 'ts'])
          .merge(['value', 'source', 'kind', 'ingested_at']);
      }
    });
    return rows.length;
  }

  /**
   * Replaces the whole snapshot for (country, date). Entries keep upstream
   * order and are renumbered 1..N; a repeated domain keeps its first rank.
   */
  async replaceRankSnapshot(country: string, date: string, entries: RankInput[]): Promise<number> {
    const ctry = country.toUpperCase();
    const seen = new Set<string>();
    const rows: DomainRankRow[] = [];

    for (const entry of entries) {
      const domain = normalizeDomain(entry.domain);
      if (!domain || seen.has(domain)) continue;
      seen.add(domain);
      rows.push({ country: ctry, date, rank: rows.length + 1, domain, category: entry.category });
    }

    await this.db.transaction(async (trx) => {
      await trx('domain_ranks').where({ country: ctry, date }).delete();
      if (rows.length > 0) {
        await trx('domain_ranks').insert(rows);
      }
    });
    return rows.length;
  }

  async queryPoints(country: string, metric: MetricName, from: Date, to: Date): Promise<MetricPoint[]> {
    const rows: MetricPointRow[] = await this.db('metric_points')
      .select('country', 'metric', 'ts', 'value')
      .where({ country: country.toUpperCase(), metric })
      .whereBetween('ts', [from.toISOString(), to.toISOString()])
      .orderBy('ts', 'asc');

    return rows.flatMap((r) =>
      isMetricName(r.metric)
        ? [{ country: r.country, metric: r.metric, timestamp: r.ts, value: Number(r.value) }]
        : []
    );
  }

  async queryRankSnapshot(country: string, date: string, limit: number, category?: string): Promise<DomainRankEntry[]> {
    let query = this.db('domain_ranks')
      .select('country', 'date', 'rank', 'domain', 'category')
      .where({ country: country.toUpperCase(), date });
    if (category) query = query.where('category', category);

    const rows: DomainRankRow[] = await query.orderBy('rank', 'asc').limit(limit);

    return rows.map((r) => ({
      country: r.country,
      date: r.date,
      rank: Number(r.rank),
      domain: r.domain,
      category: r.category ?? null,
    }));
  }

  async listSnapshotDates(country: string, since?: string, until?: string): Promise<string[]> {
    let query = this.db('domain_ranks')
      .distinct('date')
      .where('country', country.toUpperCase())
      .orderBy('date', 'asc');

    if (since) query = query.where('date', '>=', since);
    if (until) query = query.where('date', '<=', until);

    const rows: { date: string }[] = await query;
    return rows.map((r) => r.date);
  }

  async latestSnapshotDate(country: string): Promise<string | null> {
    const row: { date: string } | undefined = await this.db('domain_ranks')
      .select('date')
      .where('country', country.toUpperCase())
      .orderBy('date', 'desc')
      .first();
    return row?.date ?? null;
  }

  async countByTable(): Promise<Record<string, number>> {
    const tables = ['metric_points', 'domain_ranks', 'reachability_days', 'ingestion_runs'];
    const result: Record<string, number> = {};
    for (const table of tables) {
      const rows = await this.db(table).count('* as count');
      result[table] = Number(rows[0]?.count ?? 0);
    }
    return result;
  }
}
