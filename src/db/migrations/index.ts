// ──────────────────────────────────────────
// Migration source: migrations are imported modules rather than files
// discovered on disk, so the same list runs under tsx, vitest and dist/.
// ──────────────────────────────────────────

import { Knex } from 'knex';
import * as createTables from './001_create_tables';
import * as createReachabilityDays from './002_create_reachability_days';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const MIGRATIONS: NamedMigration[] = [
  { name: '001_create_tables', migration: createTables },
  { name: '002_create_reachability_days', migration: createReachabilityDays },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return MIGRATIONS;
  },
  getMigrationName(entry) {
    return entry.name;
  },
  async getMigration(entry) {
    return entry.migration;
  },
};

export async function migrateLatest(db: Knex): Promise<void> {
  await db.migrate.latest({ migrationSource });
}
