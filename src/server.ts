// ──────────────────────────────────────────
// Composition: wires repos, services and routes into an Express app
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { Knex } from 'knex';
import { AppConfig } from './config';
import { StaticEventRegistry } from './config/events';
import { pingDb } from './db/connection';
import { ReachabilityRepo } from './domains/storage/reachability.repo';
import { TimeSeriesRepo } from './domains/storage/time-series.repo';
import {
  CloudflareRadarClient,
  FetchFn,
  IngestionRunRepo,
  IngestionService,
  OoniClient,
  createIngestionRoutes,
} from './domains/ingestion';
import { RankChangeService, WindowStatsService, createAnalyticsRoutes } from './domains/analytics';
import { AgeGateClassifier, createAgeGateRoutes, curatedAgeGates } from './domains/age-gate';
import { ReachabilityService, createReachabilityRoutes } from './domains/reachability';

const TOP_DOMAIN_DAYS = 7;
const REACHABILITY_DAYS = 120;

export interface Services {
  db: Knex;
  config: Readonly<AppConfig>;
  store: TimeSeriesRepo;
  reachabilityStore: ReachabilityRepo;
  events: StaticEventRegistry;
  ingestion: IngestionService;
  windowStats: WindowStatsService;
  rankChanges: RankChangeService;
  ageGate: AgeGateClassifier;
  reachability: ReachabilityService;
}

export function buildServices(db: Knex, config: Readonly<AppConfig>, fetchFn?: FetchFn): Services {
  const retry = { maxAttempts: config.ingest.maxAttempts, backoffMs: config.ingest.backoffMs };

  // ── Storage ──
  const store = new TimeSeriesRepo(db);
  const reachabilityStore = new ReachabilityRepo(db);
  const events = new StaticEventRegistry();

  // ── Ingestion ──
  const cloudflare = new CloudflareRadarClient({
    apiBase: config.cloudflare.apiBase,
    apiToken: config.cloudflare.apiToken,
    retry,
    fetchFn,
  });
  const ooni = new OoniClient({ apiBase: config.ooni.apiBase, retry, fetchFn });
  const ingestion = new IngestionService(store, reachabilityStore, new IngestionRunRepo(db), cloudflare, ooni, {
    lookbackDays: config.ingest.lookbackDays,
    topDays: TOP_DOMAIN_DAYS,
    topLimit: config.topDomainsLimit,
  });

  // ── Analytics ──
  const windowStats = new WindowStatsService(store, events, {
    defaultWindowDays: config.defaultWindowDays,
    minWindowPoints: config.minWindowPoints,
  });
  const rankChanges = new RankChangeService(store, config.topDomainsLimit);

  // ── Age-gate ──
  const ageGate = new AgeGateClassifier(store, curatedAgeGates, config.topDomainsLimit);

  // ── Reachability ──
  const reachability = new ReachabilityService(reachabilityStore, { defaultDays: REACHABILITY_DAYS });

  return { db, config, store, reachabilityStore, events, ingestion, windowStats, rankChanges, ageGate, reachability };
}

export function createApp(services: Services): Express {
  const { config } = services;
  const defaultCountry = config.countries[0] ?? 'GB';

  const app = express();
  app.use(express.json());

  app.use(
    '/api',
    createAnalyticsRoutes(services.store, services.events, services.windowStats, services.rankChanges, {
      country: defaultCountry,
      eventSlug: config.defaultEventSlug,
    })
  );
  app.use('/api', createAgeGateRoutes(services.ageGate, defaultCountry));
  app.use('/api', createReachabilityRoutes(services.reachability, defaultCountry));
  app.use('/api/ingest', createIngestionRoutes(services.ingestion, defaultCountry));

  // Health check
  app.get('/health', (_req, res, next) => {
    pingDb(services.db)
      .then(async (dbOk) => {
        const counts = dbOk ? await services.store.countByTable() : null;
        res.json({
          status: 'ok',
          timestamp: new Date().toISOString(),
          db: { ping: dbOk, counts },
          config: {
            countries: config.countries,
            defaultEventSlug: config.defaultEventSlug,
            cloudflareTokenSet: Boolean(config.cloudflare.apiToken),
          },
        });
      })
      .catch(next);
  });

  return app;
}
