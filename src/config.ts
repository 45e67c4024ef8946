// ──────────────────────────────────────────
// Configuration — environment → typed, frozen config
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config();

const numberFromEnv = (fallback: number) => z.coerce.number().positive().default(fallback);
const ratioFromEnv = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  ARCHIVE_DB_CLIENT: z.enum(['pg', 'better-sqlite3']).default('better-sqlite3'),
  ARCHIVE_SQLITE_FILE: z.string().default('data/archive.sqlite'),
  DATABASE_URL: z.string().optional(),
  INBOX_DIR: z.string().default('data/input'),
  INBOX_POLL_MS: numberFromEnv(30_000),
  PORT: numberFromEnv(3000),
  ALIASES_FILE: z.string().default('config/aliases.json'),
  REINGEST_POLICY: z.enum(['skip', 'version']).default('skip'),
  ENCODING_FALLBACK: z.enum(['latin1', 'none']).default('latin1'),
  SNIFF_SAMPLE_LINES: numberFromEnv(20),
  DATE_SAMPLE_ROWS: numberFromEnv(200),
  NUMERIC_COLUMN_RATIO: ratioFromEnv(0.8),
  COUNTER_NUMERIC_RATIO: ratioFromEnv(0.5),
  AUDIT_MIN_CATEGORIES: numberFromEnv(2),
  AUDIT_CORRELATE_COUNTERS: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: z.string().default('telaudit.log'),
});

export interface SniffOptions {
  sampleLines: number;
  encodingFallback: 'latin1' | 'none';
}

export interface NormalizeOptions {
  dateSampleRows: number;
  numericColumnRatio: number;
}

export interface AuditOptions {
  minCategories: number;
  correlateCounters: boolean;
  counterNumericRatio: number;
}

export interface AppConfig {
  db:
    | { client: 'pg'; connection: string }
    | { client: 'better-sqlite3'; filename: string };
  inboxDir: string;
  inboxPollMs: number;
  port: number;
  aliasesFile: string;
  reingestPolicy: 'skip' | 'version';
  sniff: SniffOptions;
  normalize: NormalizeOptions;
  audit: AuditOptions;
  log: { level: 'debug' | 'info' | 'warn' | 'error'; file: string | null };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  let db: AppConfig['db'];
  if (parsed.ARCHIVE_DB_CLIENT === 'pg') {
    if (!parsed.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when ARCHIVE_DB_CLIENT=pg');
    }
    db = { client: 'pg', connection: parsed.DATABASE_URL };
  } else {
    db = {
      client: 'better-sqlite3',
      filename: parsed.ARCHIVE_SQLITE_FILE === ':memory:'
        ? ':memory:'
        : path.resolve(parsed.ARCHIVE_SQLITE_FILE),
    };
  }

  return Object.freeze({
    db,
    inboxDir: path.resolve(parsed.INBOX_DIR),
    inboxPollMs: parsed.INBOX_POLL_MS,
    port: parsed.PORT,
    aliasesFile: path.resolve(parsed.ALIASES_FILE),
    reingestPolicy: parsed.REINGEST_POLICY,
    sniff: Object.freeze({
      sampleLines: Math.floor(parsed.SNIFF_SAMPLE_LINES),
      encodingFallback: parsed.ENCODING_FALLBACK,
    }),
    normalize: Object.freeze({
      dateSampleRows: Math.floor(parsed.DATE_SAMPLE_ROWS),
      numericColumnRatio: parsed.NUMERIC_COLUMN_RATIO,
    }),
    audit: Object.freeze({
      minCategories: Math.floor(parsed.AUDIT_MIN_CATEGORIES),
      correlateCounters: parsed.AUDIT_CORRELATE_COUNTERS,
      counterNumericRatio: parsed.COUNTER_NUMERIC_RATIO,
    }),
    log: Object.freeze({
      level: parsed.LOG_LEVEL,
      file: parsed.LOG_FILE === '' ? null : path.resolve(parsed.LOG_FILE),
    }),
  });
}
