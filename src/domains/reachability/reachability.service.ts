// ──────────────────────────────────────────
// Reachability: per-tool daily OONI series
// ──────────────────────────────────────────

import { ReachabilityStore } from '../../shared/contracts';
import { InvalidArgumentError } from '../../shared/errors';
import { REACHABILITY_TOOLS, ReachabilityReport, ReachabilityTool, isReachabilityTool } from '../../shared/types';
import { addDays, parseCountry, parseDate, parseDayCount, toDateString } from '../../shared/validate';

export interface ReachabilityOptions {
  defaultDays: number;
  now?: () => Date;
}

export interface ReachabilityParams {
  country: string;
  tools?: string[];
  days?: number;
  /** Both bounds must be given to override `days`. */
  since?: string;
  until?: string;
}

export class ReachabilityService {
  private now: () => Date;

  constructor(
    private store: ReachabilityStore,
    private options: ReachabilityOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async report(params: ReachabilityParams): Promise<ReachabilityReport> {
    const country = parseCountry(params.country);
    const tools = parseTools(params.tools);
    const { since, until } = this.resolveRange(params);

    const series: ReachabilityReport['series'] = {};
    const latestOkRate: ReachabilityReport['latestOkRate'] = {};
    for (const tool of tools) {
      const days = await this.store.queryDays(country, tool, since, until);
      series[tool] = days;
      latestOkRate[tool] = days[days.length - 1]?.okRate ?? null;
    }

    return { country, tools, since, until, series, latestOkRate };
  }

  private resolveRange(params: ReachabilityParams): { since: string; until: string } {
    if (params.since && params.until) {
      const since = parseDate(params.since, 'since');
      const until = parseDate(params.until, 'until');
      if (since > until) {
        throw new InvalidArgumentError(`since (${since}) is after until (${until})`);
      }
      return { since, until };
    }
    const days = parseDayCount(params.days ?? this.options.defaultDays, 'days');
    const end = this.now();
    return { since: toDateString(addDays(end, -days)), until: toDateString(end) };
  }
}

function parseTools(raw: string[] | undefined): ReachabilityTool[] {
  if (!raw || raw.length === 0) return [...REACHABILITY_TOOLS];
  const tools: ReachabilityTool[] = [];
  for (const name of raw) {
    const tool = name.trim().toLowerCase();
    if (!isReachabilityTool(tool)) {
      throw new InvalidArgumentError(`Unknown tool: ${name} (expected one of ${REACHABILITY_TOOLS.join(', ')})`);
    }
    if (!tools.includes(tool)) tools.push(tool);
  }
  return tools;
}
