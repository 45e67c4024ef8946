// ──────────────────────────────────────────
// Shared test fixtures: alias set, config and in-memory services
// ──────────────────────────────────────────

import { AppConfig, loadConfig, NormalizeOptions, SniffOptions } from '../config';
import { createDb } from '../db/connection';
import { migrateLatest } from '../db/migration-source';
import { createServices, Services } from '../services';
import { AliasDefinition, AliasRegistry, createAliasRegistry } from '../shared/aliases';

export const TEST_ALIASES: AliasDefinition = {
  identifiers: {
    cell_id: { label: 'Cell ID', aliases: ['Cell ID', 'EUtranCell Id', 'Cell'] },
    cell_name: { label: 'Cell Name', aliases: ['Cell Name', 'Cell'] },
    site_id: { label: 'Site ID', aliases: ['Site ID'] },
    serving_pci: { label: 'Serving PCI', aliases: ['PCI'], categories: ['cm', 'rf'] },
  },
  counterNameColumns: ['Counter'],
  nonCounterColumns: ['Date', 'Latitude', 'Longitude'],
};

export const SNIFF: SniffOptions = { sampleLines: 20, encodingFallback: 'latin1' };
export const NORMALIZE: NormalizeOptions = { dateSampleRows: 200, numericColumnRatio: 0.8 };

export function testAliases(): AliasRegistry {
  return createAliasRegistry(TEST_ALIASES);
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ ARCHIVE_SQLITE_FILE: ':memory:', LOG_FILE: '', ...env });
}

/** Services over a migrated in-memory SQLite archive. Destroy `db` when done. */
export async function createTestServices(env: NodeJS.ProcessEnv = {}): Promise<Services> {
  const config = testConfig(env);
  const db = createDb(config.db);
  await migrateLatest(db);
  return createServices(config, db, testAliases());
}

export function csv(lines: string[]): Buffer {
  return Buffer.from(`${lines.join('\n')}\n`, 'utf-8');
}
