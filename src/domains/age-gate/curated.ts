// ──────────────────────────────────────────
// Age-gate: curated reference list
// ──────────────────────────────────────────
// Loaded and validated once at module load; the lookup table is frozen and
// never mutated afterwards.

import { z } from 'zod';
import curatedJson from './age-gate-curated.json';
import { normalizeDomain, stripWww } from '../../shared/domain-name';
import { AgeGateRecord } from '../../shared/types';

const AgeGateRecordSchema = z.object({
  domain: z.string().min(1),
  category: z.string().min(1),
  gated: z.union([z.boolean(), z.literal('unknown')]),
  notes: z.string().nullable().default(null),
});

export class AgeGateLookup {
  private readonly byDomain: ReadonlyMap<string, AgeGateRecord>;

  constructor(records: AgeGateRecord[]) {
    const map = new Map<string, AgeGateRecord>();
    for (const record of records) {
      const domain = normalizeDomain(record.domain);
      map.set(domain, Object.freeze({ ...record, domain }));
    }
    this.byDomain = map;
  }

  /** Exact normalized match, then the same host without a leading `www.`. */
  lookup(domain: string): AgeGateRecord | null {
    const normalized = normalizeDomain(domain);
    const exact = this.byDomain.get(normalized);
    if (exact) return exact;
    const bare = stripWww(normalized);
    return bare ? (this.byDomain.get(bare) ?? null) : null;
  }

  records(): AgeGateRecord[] {
    return Array.from(this.byDomain.values()).sort((a, b) => a.domain.localeCompare(b.domain));
  }
}

export function parseCuratedRecords(raw: unknown): AgeGateRecord[] {
  return z.array(AgeGateRecordSchema).parse(raw);
}

export const curatedAgeGates = new AgeGateLookup(parseCuratedRecords(curatedJson));
