// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { loadConfig } from './config';
import { closeDb, getDb } from './db/connection';
import { migrateLatest } from './db/migration-source';
import { createArchiveRoutes } from './domains/archive/routes';
import { createAuditRoutes } from './domains/audit/routes';
import { createIngestionRoutes } from './domains/ingestion/routes';
import { configureLogger, createLogger } from './platform/logger';
import { Runtime } from './runtime';
import { createServices, Services } from './services';

const log = createLogger('App');

export function createApp(services: Pick<Services, 'archive' | 'ingestion' | 'audit'>): Express {
  const app = express();

  // No global body parser: the ingest router reads every upload as raw bytes
  app.use('/api/v1/ingest', createIngestionRoutes(services.ingestion));
  app.use('/api/v1/archive', createArchiveRoutes(services.archive));
  app.use('/api/v1/audit', createAuditRoutes(services.audit));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}

async function main() {
  const config = loadConfig();
  configureLogger(config.log);

  // 1. Database + migrations
  const db = getDb();
  const applied = await migrateLatest(db);
  if (applied.length > 0) log.info(`Applied migrations: ${applied.join(', ')}`);

  // 2. Domains
  const services = createServices(config, db);
  services.inboxScanner.ensureLayout();

  // 3. Background inbox scan
  const runtime = new Runtime(services.inboxScanner, config.inboxPollMs);
  runtime.start();

  const server = createApp(services).listen(config.port, () => {
    log.info(`Telecom export archive listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    log.info('Shutting down...');
    runtime.stop();
    server.close();
    closeDb()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((err) => {
    log.error(`Fatal error: ${err instanceof Error ? err.stack : String(err)}`);
    process.exit(1);
  });
}
