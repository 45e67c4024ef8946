// ──────────────────────────────────────────
// Migration: archive tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('category_counters', (t) => {
    t.string('category', 16).primary();
    t.integer('next_index').notNullable().defaultTo(0);
  });

  await knex.schema.createTable('archive_entries', (t) => {
    t.uuid('id').primary();
    t.string('category', 16).notNullable();
    t.integer('entry_index').notNullable();
    t.string('filename', 512).notNullable();
    t.string('content_hash', 64).notNullable();
    t.integer('byte_size').notNullable();
    t.integer('version').notNullable().defaultTo(1);
    t.string('status', 16).notNullable();
    t.text('failure');
    t.string('ingested_at', 32).notNullable();
    t.unique(['category', 'entry_index']);
    t.index(['category', 'filename'], 'idx_archive_entries_category_filename');
  });

  // kind = raw
  await knex.schema.createTable('raw_records', (t) => {
    t.uuid('entry_id').primary().references('id').inTable('archive_entries').onDelete('CASCADE');
    t.binary('content').notNullable();
  });

  // kind = clean
  await knex.schema.createTable('clean_tables', (t) => {
    t.uuid('entry_id').primary().references('id').inTable('archive_entries').onDelete('CASCADE');
    t.text('columns').notNullable();
    t.text('row_data').notNullable();
    t.text('provenance').notNullable();
    t.text('issues').notNullable();
    t.integer('row_count').notNullable();
    t.integer('skipped_rows').notNullable().defaultTo(0);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('clean_tables');
  await knex.schema.dropTableIfExists('raw_records');
  await knex.schema.dropTableIfExists('archive_entries');
  await knex.schema.dropTableIfExists('category_counters');
}
