// ──────────────────────────────────────────
// Analytics: Rank changes between two snapshots
// ──────────────────────────────────────────

import { TimeSeriesReader } from '../../shared/contracts';
import { normalizeDomain } from '../../shared/domain-name';
import { NotFoundError } from '../../shared/errors';
import { parseCountry, parseDate, parsePositiveInt } from '../../shared/validate';
import { DomainRankEntry, RankChange } from '../../shared/types';

export interface RankChangeParams {
  country: string;
  dateA: string;
  dateB: string;
  limit?: number;
}

export class RankChangeService {
  constructor(
    private store: TimeSeriesReader,
    private defaultLimit: number
  ) {}

  async computeRankChanges(params: RankChangeParams): Promise<RankChange[]> {
    const country = parseCountry(params.country);
    const dateA = parseDate(params.dateA, 'date_a');
    const dateB = parseDate(params.dateB, 'date_b');
    const limit = parsePositiveInt(params.limit ?? this.defaultLimit, 'limit');

    const [snapshotA, snapshotB] = await Promise.all([
      this.store.queryRankSnapshot(country, dateA, limit),
      this.store.queryRankSnapshot(country, dateB, limit),
    ]);

    if (snapshotA.length === 0) {
      throw new NotFoundError(`No ranking snapshot for ${country} on ${dateA}`);
    }
    if (snapshotB.length === 0) {
      throw new NotFoundError(`No ranking snapshot for ${country} on ${dateB}`);
    }

    return diffRankSnapshots(snapshotA, snapshotB);
  }
}

// ── Helpers ──

function rankMap(snapshot: DomainRankEntry[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const entry of snapshot) {
    const domain = normalizeDomain(entry.domain);
    if (!map.has(domain)) map.set(domain, entry.rank);
  }
  return map;
}

/**
 * delta = rankA − rankB, so a positive delta means the domain climbed.
 * Moved entries come first by |delta| desc; entrants and drop-outs follow.
 * Ties break on domain name.
 */
export function diffRankSnapshots(snapshotA: DomainRankEntry[], snapshotB: DomainRankEntry[]): RankChange[] {
  const ranksA = rankMap(snapshotA);
  const ranksB = rankMap(snapshotB);
  const domains = new Set([...ranksA.keys(), ...ranksB.keys()]);
  const changes: RankChange[] = [];

  for (const domain of domains) {
    const rankA = ranksA.get(domain) ?? null;
    const rankB = ranksB.get(domain) ?? null;

    if (rankA !== null && rankB !== null) {
      const delta = rankA - rankB;
      changes.push({ domain, rankA, rankB, delta, status: delta === 0 ? 'unchanged' : 'moved' });
    } else if (rankB !== null) {
      changes.push({ domain, rankA: null, rankB, delta: null, status: 'new_entrant' });
    } else {
      changes.push({ domain, rankA, rankB: null, delta: null, status: 'dropped_out' });
    }
  }

  return changes.sort(compareChanges);
}

function compareChanges(a: RankChange, b: RankChange): number {
  if (a.delta !== null && b.delta !== null) {
    const byMagnitude = Math.abs(b.delta) - Math.abs(a.delta);
    if (byMagnitude !== 0) return byMagnitude;
  } else if (a.delta !== null) {
    return -1;
  } else if (b.delta !== null) {
    return 1;
  }
  return a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0;
}
