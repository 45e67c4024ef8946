// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import knex, { Knex } from 'knex';
import { AppConfig, loadConfig } from '../config';

let db: Knex | undefined;

export function createDb(config: AppConfig['db']): Knex {
  if (config.client === 'pg') {
    return knex({
      client: 'pg',
      connection: config.connection,
      pool: { min: 2, max: 10 },
    });
  }

  if (config.filename !== ':memory:') {
    fs.mkdirSync(path.dirname(config.filename), { recursive: true });
  }
  // One connection: an in-memory database only exists on the handle that created it
  return knex({
    client: 'better-sqlite3',
    connection: { filename: config.filename },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
  });
}

export function getDb(): Knex {
  if (!db) {
    db = createDb(loadConfig().db);
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
