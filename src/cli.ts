#!/usr/bin/env node
// ──────────────────────────────────────────
// CLI — archive navigation, ingestion and audit reports
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { loadConfig } from './config';
import { closeDb, getDb } from './db/connection';
import { migrateLatest } from './db/migration-source';
import { aggregateTables, renderEntries, renderTable } from './domains/archive/archive.view';
import { renderAuditMatrix, renderHeaderMatrix } from './domains/audit/render';
import { configureLogger, createLogger } from './platform/logger';
import { Runtime } from './runtime';
import { createServices, Services } from './services';
import { ArchiveNotFoundError, DataQualityError } from './shared/errors';
import { categorySchema, indexSchema } from './shared/http';
import { Category, IngestOutcome, StoredCleanTable } from './shared/types';

const log = createLogger('CLI');

const DEFAULT_LIMIT = 5;

export const USAGE = `Usage: telaudit <command> [options]

Commands:
  migrate                                 Apply pending archive migrations
  ingest <category> <file...>             Archive files into a category
  scan                                    Ingest everything waiting in the inbox
  list [category]                         List archive entries and their indices
  show <category> [index] [--limit n] [--raw]
                                          Preview a clean table (all tables without index)
  kpi [--show-all]                        Identifier and counter matrix across categories
  headers [category]                      Column presence per archived file
  watch                                   Scan the inbox on an interval until stopped

Categories: pm, cm, site (alias: database), rf`;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  raw(bytes: Buffer): void;
}

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Set<string>;
  limit: number;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Set<string>();
  let limit = DEFAULT_LIMIT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--limit') {
      limit = indexSchema.parse(argv[++i]);
    } else if (arg.startsWith('--limit=')) {
      limit = indexSchema.parse(arg.slice('--limit='.length));
    } else if (arg.startsWith('--')) {
      flags.add(arg.slice(2));
    } else {
      positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags, limit };
}

function parseCategory(value: string | undefined): Category {
  if (value === undefined) throw new UsageError('Missing category');
  const parsed = categorySchema.safeParse(value);
  if (!parsed.success) throw new UsageError(`Unknown category "${value}"`);
  return parsed.data;
}

class UsageError extends Error {}

function describeOutcome(file: string, outcome: IngestOutcome): string {
  const { entry } = outcome;
  const ref = `${entry.category} #${entry.index}`;
  switch (outcome.status) {
    case 'duplicate':
      return `${file}: duplicate of ${ref}, skipped`;
    case 'raw_only':
      return `${file}: archived as ${ref} (raw only: ${entry.failure?.message ?? 'not normalized'})`;
    case 'normalized':
      return `${file}: archived as ${ref} (v${entry.version}, ${outcome.rowCount} rows, ${outcome.skippedRows} skipped, ${outcome.issues.length} issues)`;
  }
}

async function watch(services: Services, io: CliIO): Promise<void> {
  services.inboxScanner.ensureLayout();
  const runtime = new Runtime(services.inboxScanner, services.config.inboxPollMs);
  const first = await runtime.scanOnce();
  io.out(`Ingested ${first} file(s); watching ${services.config.inboxDir} (Ctrl+C to stop)`);
  runtime.start();

  await new Promise<void>((resolve) => {
    const stop = () => {
      runtime.stop();
      resolve();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });
}

async function show(services: Services, args: ParsedArgs, io: CliIO): Promise<number> {
  const category = parseCategory(args.positionals[0]);
  const { archive } = services;

  if (args.positionals[1] !== undefined) {
    const index = indexSchema.parse(args.positionals[1]);
    if (args.flags.has('raw')) {
      io.raw((await archive.getRaw(category, index)).content);
      return 0;
    }
    const entry = await archive.getEntry(category, index);
    const stored = await archive.loadClean(entry);
    if (!stored) {
      io.err(`[${index}] ${entry.filename} is archived raw only: ${entry.failure?.message ?? 'not normalized'}`);
      return 1;
    }
    io.out(`Reading [${index}]: ${entry.filename}`);
    io.out(renderTable({ columns: stored.table.columns.map((c) => c.name), rows: stored.table.rows }, args.limit));
    return 0;
  }

  const stored: StoredCleanTable[] = [];
  for (const entry of await archive.listEntries(category)) {
    const clean = await archive.loadClean(entry);
    if (clean) stored.push(clean);
  }
  if (stored.length === 0) {
    io.err(`No clean ${category} tables in the archive`);
    return 1;
  }
  io.out(`Aggregating ${stored.length} table(s)...`);
  io.out(renderTable(aggregateTables(stored), args.limit));
  return 0;
}

export async function runCli(argv: string[], services: Services, io: CliIO): Promise<number> {
  try {
    const args = parseArgs(argv);
    switch (args.command) {
      case 'migrate': {
        const applied = await migrateLatest(services.db);
        io.out(applied.length ? `Applied: ${applied.join(', ')}` : 'Already up to date');
        return 0;
      }

      case 'ingest': {
        const category = parseCategory(args.positionals[0]);
        const files = args.positionals.slice(1);
        if (files.length === 0) throw new UsageError('No files given');
        for (const file of files) {
          const content = fs.readFileSync(file);
          const outcome = await services.ingestion.ingest({ category, filename: path.basename(file), content });
          io.out(describeOutcome(path.basename(file), outcome));
        }
        return 0;
      }

      case 'scan': {
        services.inboxScanner.ensureLayout();
        const results = await services.inboxScanner.run();
        for (const r of results) {
          io.out(r.outcome ? describeOutcome(r.file, r.outcome) : `${r.file}: failed (${r.error ?? 'unknown error'})`);
        }
        io.out(`Scanned inbox: ${results.length} file(s)`);
        return results.some((r) => r.error !== null) ? 1 : 0;
      }

      case 'list': {
        const category = args.positionals[0] === undefined ? undefined : parseCategory(args.positionals[0]);
        const entries = await services.archive.listEntries(category);
        io.out(renderEntries(entries, category ? [category] : undefined));
        return 0;
      }

      case 'show':
        return await show(services, args, io);

      case 'kpi': {
        const matrix = await services.audit.buildMatrix();
        io.out(renderAuditMatrix(matrix, services.aliases, { showAll: args.flags.has('show-all') }));
        return 0;
      }

      case 'headers': {
        const category = args.positionals[0] === undefined ? undefined : parseCategory(args.positionals[0]);
        io.out(renderHeaderMatrix(await services.audit.headerMatrix(category)));
        return 0;
      }

      case 'watch':
        await watch(services, io);
        return 0;

      case undefined:
      case 'help':
        io.out(USAGE);
        return 0;

      default:
        throw new UsageError(`Unknown command "${args.command}"`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof ArchiveNotFoundError || err instanceof DataQualityError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    if (err instanceof ZodError) {
      io.err(`Error: ${err.issues.map((i) => i.message).join('; ')}`);
      return 1;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  configureLogger(config.log);

  const db = getDb();
  try {
    if (process.argv[2] !== 'migrate') await migrateLatest(db);
    const services = createServices(config, db);
    return await runCli(process.argv.slice(2), services, {
      out: (text) => console.log(text),
      err: (text) => console.error(text),
      raw: (bytes) => process.stdout.write(bytes),
    });
  } finally {
    await closeDb();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      log.error(`Fatal error: ${err instanceof Error ? err.stack : String(err)}`);
      process.exit(1);
    });
}
