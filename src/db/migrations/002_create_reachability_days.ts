// ──────────────────────────────────────────
// Migration: daily OONI counts per circumvention tool
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('reachability_days', (t) => {
    t.string('country', 2).notNullable();
    t.string('tool', 20).notNullable();
    t.string('date', 10).notNullable();
    t.integer('ok').notNullable();
    t.integer('tests').notNullable();
    t.double('ok_rate').notNullable();
    t.string('ingested_at', 32).notNullable();
    t.primary(['country', 'tool', 'date']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('reachability_days');
}
