// ──────────────────────────────────────────
// Script: Reset. Drop all tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest } from '../src/db/migrations';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  await db.raw('DROP TABLE IF EXISTS ingestion_runs CASCADE');
  await db.raw('DROP TABLE IF EXISTS reachability_days CASCADE');
  await db.raw('DROP TABLE IF EXISTS domain_ranks CASCADE');
  await db.raw('DROP TABLE IF EXISTS metric_points CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await migrateLatest(db);

  console.log('[Reset] ✅ Done: all tables recreated');
  await closeDb();
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
