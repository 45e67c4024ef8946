// ──────────────────────────────────────────
// Service wiring shared by the server and the CLI
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { AppConfig } from './config';
import { ArchiveRepo } from './domains/archive/archive.repo';
import { CounterRepo } from './domains/archive/counter.repo';
import { AuditService } from './domains/audit/audit.service';
import { InboxScanner } from './domains/ingestion/inbox/inbox.scanner';
import { IngestionService } from './domains/ingestion/ingestion.service';
import { AliasRegistry, loadAliasRegistry } from './shared/aliases';

export interface Services {
  config: AppConfig;
  db: Knex;
  aliases: AliasRegistry;
  archive: ArchiveRepo;
  ingestion: IngestionService;
  audit: AuditService;
  inboxScanner: InboxScanner;
}

export function createServices(
  config: AppConfig,
  db: Knex,
  aliases: AliasRegistry = loadAliasRegistry(config.aliasesFile)
): Services {
  // ── Archive ──
  const archive = new ArchiveRepo(db);
  const counters = new CounterRepo();

  // ── Ingestion ──
  const ingestion = new IngestionService(db, archive, counters, aliases, {
    reingestPolicy: config.reingestPolicy,
    sniff: config.sniff,
    normalize: config.normalize,
  });
  const inboxScanner = new InboxScanner(config.inboxDir, ingestion);

  // ── Audit ──
  const audit = new AuditService(archive, aliases, config.audit);

  return { config, db, aliases, archive, ingestion, audit, inboxScanner };
}
