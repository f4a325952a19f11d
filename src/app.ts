// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getConfig } from './config';
import { getDb, closeDb } from './db/connection';
import { migrateLatest } from './db/migrations';
import { buildServices, createApp } from './server';
import { Runtime } from './runtime';

async function main() {
  const config = getConfig();
  const db = getDb();

  await migrateLatest(db);

  const services = buildServices(db, config);
  const runtime = new Runtime(services.ingestion, config.countries, config.ingest.intervalMs);
  const app = createApp(services);

  runtime.start();
  const server = app.listen(config.port, () => {
    console.log(`[App] Netwatch listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
