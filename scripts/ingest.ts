// ──────────────────────────────────────────
// Script: Ingest. One-shot fetch of every kind for the configured countries
// Usage: tsx scripts/ingest.ts [kind ...]
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getConfig } from '../src/config';
import { getDb, closeDb } from '../src/db/connection';
import { migrateLatest } from '../src/db/migrations';
import { buildServices } from '../src/server';
import { INGEST_KINDS, IngestKind, isIngestKind } from '../src/shared/types';

async function ingest() {
  const config = getConfig();
  const db = getDb();
  await migrateLatest(db);

  const requested = process.argv.slice(2);
  const unknown = requested.filter((k) => !isIngestKind(k));
  if (unknown.length > 0) {
    throw new Error(`Unknown kinds: ${unknown.join(', ')} (expected ${INGEST_KINDS.join(', ')})`);
  }
  const kinds: IngestKind[] = requested.length > 0 ? requested.filter(isIngestKind) : [...INGEST_KINDS];

  const { ingestion } = buildServices(db, config);
  let failed = 0;
  for (const country of config.countries) {
    const summary = await ingestion.ingestAll(country, kinds);
    for (const run of summary.runs) {
      console.log(`[Ingest] ${country} ${run.kind}: ${run.points} records`);
    }
    for (const failure of summary.failures) {
      console.error(`[Ingest] ${country} ${failure.kind} failed: ${failure.error}`);
      failed++;
    }
  }

  await closeDb();
  process.exit(failed > 0 ? 1 : 0);
}

ingest().catch((err) => {
  console.error('[Ingest] Error:', err);
  process.exit(1);
});
