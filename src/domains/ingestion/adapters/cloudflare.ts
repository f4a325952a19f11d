// ──────────────────────────────────────────
// Ingestion: Cloudflare Radar adapter
// ──────────────────────────────────────────

import { RankInput } from '../../../shared/contracts';
import { NotConfiguredError, UpstreamError, errorMessage } from '../../../shared/errors';
import { L3Direction, MetricName } from '../../../shared/types';
import { addDays } from '../../../shared/validate';
import { parseTimeseriesResult, parseTopDomains, SeriesValue } from '../normalize';
import { RetryPolicy, withRetry } from '../retry';
import { FetchFn, QueryParams, buildUrl, getJson } from './http-client';

export type SeriesRequest =
  | { kind: 'http' }
  | { kind: 'l3'; direction: L3Direction }
  | { kind: 'bots' };

interface SeriesEndpoint {
  path: string;
  metric: MetricName;
  params: QueryParams;
}

/** One endpoint per tagged kind. */
export function seriesEndpoint(req: SeriesRequest): SeriesEndpoint {
  switch (req.kind) {
    case 'http':
      return {
        path: '/radar/http/timeseries',
        metric: 'http_requests_norm',
        params: { name: 'main', aggInterval: '1h' },
      };
    case 'l3':
      return {
        path: '/radar/attacks/layer3/timeseries',
        metric: req.direction === 'target' ? 'l3_bytes_target' : 'l3_bytes_origin',
        params: { metric: 'bytes', direction: req.direction, aggInterval: '1d' },
      };
    case 'bots':
      return {
        path: '/radar/bots/timeseries',
        metric: 'bot_traffic',
        params: { aggInterval: '1d' },
      };
  }
}

export interface CloudflareClientOptions {
  apiBase: string;
  apiToken: string | undefined;
  retry: RetryPolicy;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export class CloudflareRadarClient {
  private fetchFn: FetchFn;
  private now: () => Date;

  constructor(private options: CloudflareClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Requests an explicit dateStart/dateEnd range first; when Radar rejects
   * it, asks again with a relative dateRange of the same length.
   */
  async fetchSeries(req: SeriesRequest, country: string, days: number): Promise<{ metric: MetricName; points: SeriesValue[] }> {
    const endpoint = seriesEndpoint(req);
    const until = this.now();
    const base: QueryParams = { ...endpoint.params, location: country.toUpperCase(), format: 'json' };

    let result: unknown;
    try {
      result = await this.request(endpoint.path, {
        ...base,
        dateStart: addDays(until, -days).toISOString(),
        dateEnd: until.toISOString(),
      });
    } catch (err) {
      if (!(err instanceof UpstreamError)) throw err;
      console.warn(`[Cloudflare] ${req.kind} explicit range failed, falling back to dateRange: ${errorMessage(err)}`);
      result = await this.request(endpoint.path, { ...base, dateRange: `${days}d` });
    }

    return { metric: endpoint.metric, points: parseTimeseriesResult(result) };
  }

  async fetchTopDomains(country: string, date: string, limit: number): Promise<RankInput[]> {
    const result = await this.request('/radar/ranking/top', {
      name: 'top',
      location: country.toUpperCase(),
      limit,
      date,
      format: 'json',
    });
    return parseTopDomains(result);
  }

  private async request(path: string, params: QueryParams): Promise<unknown> {
    const token = this.options.apiToken;
    if (!token) {
      throw new NotConfiguredError('CLOUDFLARE_API_TOKEN is not set');
    }
    const url = buildUrl(this.options.apiBase, path, params);

    return withRetry(`Cloudflare ${path}`, this.options.retry, async () => {
      const body = await getJson(this.fetchFn, url, { Authorization: `Bearer ${token}` });
      if (typeof body !== 'object' || body === null || !('success' in body) || body.success !== true) {
        const errors = typeof body === 'object' && body !== null && 'errors' in body ? JSON.stringify(body.errors) : 'unknown';
        throw new UpstreamError(`Cloudflare API error on ${path}: ${errors}`);
      }
      return 'result' in body ? (body.result ?? {}) : {};
    });
  }
}
