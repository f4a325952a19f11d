// ──────────────────────────────────────────
// Database connection: Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { getConfig } from '../config';

let db: Knex | undefined;

export function getDb(): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: getConfig().databaseUrl,
      pool: { min: 2, max: 10 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}

export async function pingDb(conn: Knex): Promise<boolean> {
  try {
    await conn.raw('select 1');
    return true;
  } catch (err) {
    console.error('[Db] Ping failed:', err instanceof Error ? err.message : String(err));
    return false;
  }
}
