// ──────────────────────────────────────────
// Storage: Daily OONI reachability counts
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { ReachabilityStore } from '../../shared/contracts';
import { ReachabilityDay, ReachabilityTool } from '../../shared/types';

interface ReachabilityDayRow {
  country: string;
  tool: string;
  date: string;
  ok: number | string;
  tests: number | string;
  ok_rate: number | string;
}

export class ReachabilityRepo implements ReachabilityStore {
  constructor(private db: Knex) {}

  async upsertDays(days: ReachabilityDay[]): Promise<number> {
    if (days.length === 0) return 0;

    const ingestedAt = new Date().toISOString();
    await this.db('reachability_days')
      .insert(
        days.map((d) => ({
          country: d.country.toUpperCase(),
          tool: d.tool,
          date: d.date,
          ok: d.ok,
          tests: d.tests,
          ok_rate: d.okRate,
          ingested_at: ingestedAt,
        }))
      )
      .onConflict(['country', 'tool', 'date'])
      .merge(['ok', 'tests', 'ok_rate', 'ingested_at']);
    return days.length;
  }

  async queryDays(country: string, tool: ReachabilityTool, since: string, until: string): Promise<ReachabilityDay[]> {
    const rows: ReachabilityDayRow[] = await this.db('reachability_days')
      .select('country', 'tool', 'date', 'ok', 'tests', 'ok_rate')
      .where({ country: country.toUpperCase(), tool })
      .whereBetween('date', [since, until])
      .orderBy('date', 'asc');

    return rows.map((r) => ({
      country: r.country,
      tool,
      date: r.date,
      ok: Number(r.ok),
      tests: Number(r.tests),
      okRate: Number(r.ok_rate),
    }));
  }
}
