// ──────────────────────────────────────────
// Ingestion: Run bookkeeping repository
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { Knex } from 'knex';
import { IngestKind, IngestionRun, Source } from '../../shared/types';

export class IngestionRunRepo {
  constructor(private db: Knex) {}

  async start(params: { source: Source; kind: IngestKind; country: string }): Promise<string> {
    const id = uuidv4();
    await this.db('ingestion_runs').insert({
      id,
      source: params.source,
      kind: params.kind,
      country: params.country,
      status: 'running',
      points: 0,
      created_at: new Date().toISOString(),
    });
    return id;
  }

  async complete(id: string, points: number): Promise<void> {
    await this.db('ingestion_runs').where('id', id).update({
      status: 'completed',
      points,
      completed_at: new Date().toISOString(),
    });
  }

  async fail(id: string, error: string): Promise<void> {
    await this.db('ingestion_runs').where('id', id).update({
      status: 'failed',
      error,
      completed_at: new Date().toISOString(),
    });
  }

  async findById(id: string): Promise<IngestionRun | null> {
    const row = await this.db('ingestion_runs').where('id', id).first();
    return row ? toRun(row) : null;
  }

  async listRecent(country?: string, limit = 50): Promise<IngestionRun[]> {
    let query = this.db('ingestion_runs').orderBy('created_at', 'desc').limit(limit);
    if (country) query = query.where('country', country.toUpperCase());
    const rows: IngestionRun[] = await query;
    return rows.map(toRun);
  }
}

function toRun(row: IngestionRun): IngestionRun {
  return { ...row, points: Number(row.points), error: row.error ?? null, completed_at: row.completed_at ?? null };
}
