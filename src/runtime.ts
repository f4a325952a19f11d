// ──────────────────────────────────────────
// Runtime: Background ingestion scheduler
// ──────────────────────────────────────────

import { IngestionService } from './domains/ingestion/ingestion.service';

export class Runtime {
  private intervals: NodeJS.Timeout[] = [];
  private running = false;

  constructor(
    private ingestionService: IngestionService,
    private countries: string[],
    private intervalMs: number
  ) {}

  start(): void {
    this.intervals.push(
      setInterval(() => {
        this.runOnce().catch((err: unknown) =>
          console.error('[Runtime] Ingestion error:', err instanceof Error ? err.message : String(err))
        );
      }, this.intervalMs)
    );
    console.log(`[Runtime] Started ingestion refresh for ${this.countries.join(',')} every ${this.intervalMs}ms`);
  }

  stop(): void {
    this.intervals.forEach(clearInterval);
    this.intervals = [];
    console.log('[Runtime] Stopped background jobs');
  }

  /** Skips the tick when the previous refresh is still in flight. */
  async runOnce(): Promise<void> {
    if (this.running) {
      console.warn('[Runtime] Previous refresh still running, skipping');
      return;
    }
    this.running = true;
    try {
      for (const country of this.countries) {
        const summary = await this.ingestionService.ingestAll(country);
        for (const failure of summary.failures) {
          console.error(`[Runtime] ${country} ${failure.kind} failed: ${failure.error}`);
        }
      }
    } finally {
      this.running = false;
    }
  }
}
