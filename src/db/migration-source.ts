// ──────────────────────────────────────────
// Migrations bundled as code, so tsx, vitest and compiled output
// all resolve the same list without a directory scan
// ──────────────────────────────────────────

import { Knex } from 'knex';
import * as createArchiveTables from './migrations/001_create_archive_tables';

const MIGRATIONS: Record<string, Knex.Migration> = {
  '001_create_archive_tables': createArchiveTables,
};

export class CodeMigrationSource implements Knex.MigrationSource<string> {
  async getMigrations(): Promise<string[]> {
    return Object.keys(MIGRATIONS).sort();
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  async getMigration(migration: string): Promise<Knex.Migration> {
    const found = MIGRATIONS[migration];
    if (!found) throw new Error(`Unknown migration: ${migration}`);
    return found;
  }
}

export async function migrateLatest(db: Knex): Promise<string[]> {
  const [, applied]: [number, string[]] = await db.migrate.latest({
    migrationSource: new CodeMigrationSource(),
  });
  return applied;
}

export async function migrateRollbackAll(db: Knex): Promise<void> {
  await db.migrate.rollback({ migrationSource: new CodeMigrationSource() }, true);
}
