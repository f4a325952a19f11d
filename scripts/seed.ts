// ──────────────────────────────────────────
// Script: Seed. Synthetic metric points and rank snapshots around the
// default event, for local demos without upstream credentials
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getConfig } from '../src/config';
import { StaticEventRegistry } from '../src/config/events';
import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest } from '../src/db/migrations';
import { ReachabilityRepo } from '../src/domains/storage/reachability.repo';
import { TimeSeriesRepo } from '../src/domains/storage/time-series.repo';
import { RankInput } from '../src/shared/contracts';
import { ReachabilityDay, StoredMetricPoint } from '../src/shared/types';
import { addDays, toDateString } from '../src/shared/validate';

const SEED_DAYS = 30;

async function seed() {
  const config = getConfig();
  const db = getDb();
  const store = new TimeSeriesRepo(db);
  const event = new StaticEventRegistry().resolve(config.defaultEventSlug);

  console.log('[Seed] Running migrations...');
  await migrateLatest(db);

  console.log('[Seed] Clearing existing data...');
  await db('metric_points').delete();
  await db('domain_ranks').delete();
  await db('reachability_days').delete();

  // ── 1. Daily metric points, with a step change at the event ──
  const points: StoredMetricPoint[] = [];
  const torDays: ReachabilityDay[] = [];
  for (let d = -SEED_DAYS; d <= SEED_DAYS; d++) {
    const ts = addDays(event.instant, d).toISOString();
    const after = d >= 0;
    const noise = () => (Math.random() - 0.5) * 0.05;

    points.push({ country: event.country, metric: 'http_requests_norm', timestamp: ts, value: 0.6 + noise(), source: 'cloudflare', kind: 'http' });
    points.push({ country: event.country, metric: 'bot_traffic', timestamp: ts, value: 0.3 + noise(), source: 'cloudflare', kind: 'bots' });
    const tests = 200;
    const ok = Math.round(tests * ((after ? 0.8 : 0.9) + noise()));
    torDays.push({ country: event.country, tool: 'tor', date: ts.slice(0, 10), ok, tests, okRate: ok / tests });
    points.push({ country: event.country, metric: 'ooni_ok_rate_tor', timestamp: ts, value: ok / tests, source: 'ooni', kind: 'reachability' });
    points.push({ country: 'IE', metric: 'http_requests_norm', timestamp: ts, value: 0.55 + noise(), source: 'cloudflare', kind: 'http' });
  }
  const upserted = await store.upsertPoints(points);
  console.log(`[Seed] Upserted ${upserted} metric points`);
  await new ReachabilityRepo(db).upsertDays(torDays);
  console.log(`[Seed] Upserted ${torDays.length} Tor reachability days`);

  // ── 2. Rank snapshots, one every 7 days ──
  const baseline = ['google.com', 'youtube.com', 'facebook.com', 'bbc.co.uk', 'wikipedia.org', 'reddit.com', 'x.com', 'instagram.com'];
  for (let d = -28; d <= 28; d += 7) {
    const date = toDateString(addDays(event.instant, d));
    const domains = d >= 0 ? [...baseline.filter((x) => x !== 'reddit.com'), 'protonvpn.com'] : baseline;
    const entries: RankInput[] = domains.map((domain) => ({ domain, category: null }));
    await store.replaceRankSnapshot(event.country, date, entries);
  }
  console.log('[Seed] Wrote 9 rank snapshots');

  await closeDb();
  console.log('[Seed] ✅ Done');
}

seed().catch((err) => {
  console.error('[Seed] Error:', err);
  process.exit(1);
});
