// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { EventRegistry, TimeSeriesReader } from '../../shared/contracts';
import { InvalidArgumentError } from '../../shared/errors';
import { addDays, parseCountry, parseDayCount, parseMetric } from '../../shared/validate';
import { MetricName, MetricPoint } from '../../shared/types';
import { queryList, queryNumber, queryString, route, sendOk } from '../../platform/http';
import { WindowStatsService } from './window-stats';
import { RankChangeService } from './rank-changes';

export interface AnalyticsRouteDefaults {
  country: string;
  eventSlug: string;
}

interface TimeseriesResponse {
  metric: MetricName;
  since: string;
  until: string;
  points: MetricPoint[];
  controls?: Record<string, MetricPoint[]>;
}

function parseInstant(raw: string, name: string): Date {
  const t = new Date(raw);
  if (isNaN(t.getTime())) {
    throw new InvalidArgumentError(`${name} is not a valid timestamp: ${raw}`);
  }
  return t;
}

export function createAnalyticsRoutes(
  store: TimeSeriesReader,
  events: EventRegistry,
  windowStats: WindowStatsService,
  rankChanges: RankChangeService,
  defaults: AnalyticsRouteDefaults
): Router {
  const router = Router();

  // GET /events: configured event registry
  router.get('/events', route(async (_req: Request, res: Response) => {
    sendOk(res, events.list());
  }));

  // GET /events/:slug: single event
  router.get('/events/:slug', route(async (req: Request, res: Response) => {
    sendOk(res, events.resolve(String(req.params.slug)));
  }));

  // GET /timeseries?country=GB&metric=http_requests_norm&days=30 (or since/until ISO)&controls=IE,NL
  router.get('/timeseries', route(async (req: Request, res: Response) => {
    const country = parseCountry(queryString(req, 'country') ?? defaults.country);
    const metric = parseMetric(queryString(req, 'metric') ?? 'http_requests_norm');
    const controls = Array.from(new Set(queryList(req, 'controls').map(parseCountry))).filter((c) => c !== country);
    const sinceRaw = queryString(req, 'since');
    const untilRaw = queryString(req, 'until');

    const until = untilRaw ? parseInstant(untilRaw, 'until') : new Date();
    const since = sinceRaw
      ? parseInstant(sinceRaw, 'since')
      : addDays(until, -parseDayCount(queryNumber(req, 'days') ?? 30, 'days'));

    const points = await store.queryPoints(country, metric, since, until);
    const body: TimeseriesResponse = { metric, since: since.toISOString(), until: until.toISOString(), points };

    // Control countries over the same range, for overlay charts
    if (controls.length > 0) {
      const series = await Promise.all(controls.map((c) => store.queryPoints(c, metric, since, until)));
      body.controls = Object.fromEntries(controls.map((c, i) => [c, series[i] ?? []]));
    }
    sendOk(res, body, country);
  }));

  // GET /window-stats?country=GB&metric=http_requests_norm&event=uk-age-verify-2025&window=14&controls=IE,NL
  router.get('/window-stats', route(async (req: Request, res: Response) => {
    const result = await windowStats.computeWindowStats({
      country: queryString(req, 'country') ?? defaults.country,
      metric: queryString(req, 'metric') ?? 'http_requests_norm',
      eventSlug: queryString(req, 'event') ?? defaults.eventSlug,
      windowDays: queryNumber(req, 'window'),
      controls: queryList(req, 'controls'),
    });
    sendOk(res, result, result.country);
  }));

  // GET /rank-changes?country=GB&dateA=2025-07-20&dateB=2025-07-30&limit=100
  router.get('/rank-changes', route(async (req: Request, res: Response) => {
    const country = parseCountry(queryString(req, 'country') ?? defaults.country);
    const dateA = queryString(req, 'dateA');
    const dateB = queryString(req, 'dateB');
    if (!dateA || !dateB) {
      throw new InvalidArgumentError('dateA and dateB are required (YYYY-MM-DD)');
    }
    const changes = await rankChanges.computeRankChanges({ country, dateA, dateB, limit: queryNumber(req, 'limit') });
    sendOk(res, changes, country);
  }));

  return router;
}
