// ──────────────────────────────────────────
// Ingestion: OONI reachability adapter
// ──────────────────────────────────────────

import { MetricName, ReachabilityDay, ReachabilityTool } from '../../../shared/types';
import { addDays, toDateString } from '../../../shared/validate';
import { parseReachabilityRows } from '../normalize';
import { RetryPolicy, withRetry } from '../retry';
import { FetchFn, buildUrl, getJson } from './http-client';

export function reachabilityMetric(tool: ReachabilityTool): MetricName {
  switch (tool) {
    case 'tor':
      return 'ooni_ok_rate_tor';
    case 'snowflake':
      return 'ooni_ok_rate_snowflake';
    case 'psiphon':
      return 'ooni_ok_rate_psiphon';
  }
}

export interface OoniClientOptions {
  apiBase: string;
  retry: RetryPolicy;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export class OoniClient {
  private fetchFn: FetchFn;
  private now: () => Date;

  constructor(private options: OoniClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Daily ok_count / measurement_count for one tool. Days with no
   * measurements produce no entry.
   */
  async fetchDailyCounts(tool: ReachabilityTool, country: string, days: number): Promise<ReachabilityDay[]> {
    const ctry = country.toUpperCase();
    const end = this.now();
    const url = buildUrl(this.options.apiBase, '/aggregation', {
      probe_cc: ctry,
      test_name: tool,
      since: toDateString(addDays(end, -days)),
      until: toDateString(end),
      axis_x: 'measurement_start_day',
      format: 'JSON',
    });

    const payload = await withRetry(`OONI ${tool}`, this.options.retry, () => getJson(this.fetchFn, url));

    return parseReachabilityRows(payload).flatMap((row) =>
      row.measurements > 0
        ? [{ country: ctry, tool, date: row.date, ok: row.ok, tests: row.measurements, okRate: row.ok / row.measurements }]
        : []
    );
  }
}
