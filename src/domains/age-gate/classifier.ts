// ──────────────────────────────────────────
// Age-gate: classify top domains against the curated list
// ──────────────────────────────────────────

import { TimeSeriesReader } from '../../shared/contracts';
import { NotFoundError } from '../../shared/errors';
import { parseCountry, parseDate, parsePositiveInt } from '../../shared/validate';
import { ClassifiedDomain, CuratedStatusReport, DailyGateCount, DomainRankEntry, GateStatus } from '../../shared/types';
import { AgeGateLookup } from './curated';

export interface ClassifyParams {
  country: string;
  date?: string;
  limit?: number;
}

export interface TopDomainParams extends ClassifyParams {
  /** Keep only entries whose upstream category matches exactly. */
  category?: string;
}

export interface TopDomainsResult {
  date: string;
  category: string | null;
  results: ClassifiedDomain[];
}

export interface DailyCountParams {
  country: string;
  since?: string;
  until?: string;
  limit?: number;
}

export class AgeGateClassifier {
  constructor(
    private store: TimeSeriesReader,
    private curated: AgeGateLookup,
    private defaultLimit: number
  ) {}

  /** A category filter that matches nothing gives empty results, not NotFound. */
  async classifyTopDomains(params: TopDomainParams): Promise<TopDomainsResult> {
    const country = parseCountry(params.country);
    const limit = parsePositiveInt(params.limit ?? this.defaultLimit, 'limit');
    const category = params.category?.trim() || null;
    const date = await this.resolveDate(country, params.date);
    if (!date) {
      throw new NotFoundError(`No ranking snapshots for ${country}`);
    }

    const snapshot = await this.store.queryRankSnapshot(country, date, limit, category ?? undefined);
    if (snapshot.length === 0) {
      const snapshotExists = category !== null && (await this.store.queryRankSnapshot(country, date, 1)).length > 0;
      if (!snapshotExists) {
        throw new NotFoundError(`No ranking snapshot for ${country} on ${date}`);
      }
    }
    return { date, category, results: snapshot.map((entry) => this.classify(entry)) };
  }

  /** Dates without a snapshot are skipped, not zero-filled. */
  async dailyGatedCounts(params: DailyCountParams): Promise<DailyGateCount[]> {
    const country = parseCountry(params.country);
    const since = params.since ? parseDate(params.since, 'since') : undefined;
    const until = params.until ? parseDate(params.until, 'until') : undefined;
    const limit = parsePositiveInt(params.limit ?? this.defaultLimit, 'limit');

    const dates = await this.store.listSnapshotDates(country, since, until);
    const counts: DailyGateCount[] = [];

    for (const date of dates) {
      const snapshot = await this.store.queryRankSnapshot(country, date, limit);
      if (snapshot.length === 0) continue;

      const row: DailyGateCount = { date, gated: 0, unknown: 0, notGated: 0 };
      for (const entry of snapshot) {
        const gated = this.classify(entry).gated;
        if (gated === true) row.gated++;
        else if (gated === false) row.notGated++;
        else row.unknown++;
      }
      counts.push(row);
    }
    return counts;
  }

  /** Every curated record, flagged when it appears in the day's top-N. */
  async curatedStatus(params: ClassifyParams): Promise<CuratedStatusReport> {
    const country = parseCountry(params.country);
    const limit = parsePositiveInt(params.limit ?? this.defaultLimit, 'limit');
    const date = await this.resolveDate(country, params.date);
    const snapshot = date ? await this.store.queryRankSnapshot(country, date, limit) : [];

    const topRanks = new Map<string, number>();
    for (const entry of snapshot) {
      const record = this.curated.lookup(entry.domain);
      if (record && !topRanks.has(record.domain)) topRanks.set(record.domain, entry.rank);
    }

    const results = this.curated.records().map((record) => {
      const rank = topRanks.get(record.domain) ?? null;
      return {
        domain: record.domain,
        category: record.category,
        gated: record.gated,
        notes: record.notes,
        inTop: rank !== null,
        rank,
      };
    });

    return {
      country,
      date,
      limit,
      results,
      counts: {
        gated: results.filter((r) => r.gated === true).length,
        unknown: results.filter((r) => r.gated === 'unknown').length,
        notGated: results.filter((r) => r.gated === false).length,
        inTop: results.filter((r) => r.inTop).length,
      },
    };
  }

  private classify(entry: DomainRankEntry): ClassifiedDomain {
    const record = this.curated.lookup(entry.domain);
    const gated: GateStatus = record ? record.gated : 'unknown';
    return { entry, gated, notes: record?.notes ?? null };
  }

  private async resolveDate(country: string, date?: string): Promise<string | null> {
    if (date) return parseDate(date);
    return this.store.latestSnapshotDate(country);
  }
}
