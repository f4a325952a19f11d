// ──────────────────────────────────────────
// Ingestion domain: barrel export
// ──────────────────────────────────────────

export { IngestionService } from './ingestion.service';
export { IngestionRunRepo } from './ingestion-run.repo';
export { CloudflareRadarClient } from './adapters/cloudflare';
export { OoniClient } from './adapters/ooni';
export { createIngestionRoutes } from './routes';
export type { FetchFn } from './adapters/http-client';
