// ──────────────────────────────────────────
// Migration: create all tables
// ──────────────────────────────────────────
// Timestamps are ISO-8601 UTC strings and dates are YYYY-MM-DD, so range
// filters compare lexically the same way on Postgres and SQLite.

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Time-series store ──

  await knex.schema.createTable('metric_points', (t) => {
    t.string('country', 2).notNullable();
    t.string('metric', 40).notNullable();
    t.string('ts', 32).notNullable();
    t.double('value').notNullable();
    t.string('source', 20).notNullable();
    t.string('kind', 20).notNullable();
    t.string('ingested_at', 32).notNullable();
    t.primary(['country', 'metric', 'ts']);
  });

  await knex.schema.createTable('domain_ranks', (t) => {
    t.string('country', 2).notNullable();
    t.string('date', 10).notNullable();
    t.integer('rank').notNullable();
    t.string('domain', 255).notNullable();
    t.string('category', 100);
    t.primary(['country', 'date', 'rank']);
    t.unique(['country', 'date', 'domain']);
  });

  // ── Ingestion bookkeeping ──

  await knex.schema.createTable('ingestion_runs', (t) => {
    t.string('id', 36).primary();
    t.string('source', 20).notNullable();
    t.string('kind', 20).notNullable();
    t.string('country', 2).notNullable();
    t.string('status', 20).notNullable().defaultTo('running');
    t.integer('points').notNullable().defaultTo(0);
    t.text('error');
    t.string('created_at', 32).notNullable();
    t.string('completed_at', 32);
    t.index(['country', 'kind', 'created_at']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('ingestion_runs');
  await knex.schema.dropTableIfExists('domain_ranks');
  await knex.schema.dropTableIfExists('metric_points');
}
