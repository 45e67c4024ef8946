// ──────────────────────────────────────────
// Ingestion: Core service — the single funnel into the archive
// ──────────────────────────────────────────

import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { Knex } from 'knex';
import { NormalizeOptions, SniffOptions } from '../../config';
import { createLogger } from '../../platform/logger';
import { AliasRegistry } from '../../shared/aliases';
import { IngestionContract } from '../../shared/contracts';
import { DataQualityError, toIssue } from '../../shared/errors';
import {
  ArchiveEntry,
  Category,
  IngestOutcome,
  IngestParams,
  IssueRecord,
  NormalizationResult,
  ReingestPolicy,
} from '../../shared/types';
import { ArchiveRepo } from '../archive/archive.repo';
import { CounterRepo } from '../archive/counter.repo';
import { normalizeTable } from './normalizer/value-normalizer';
import { sniffFormat } from './sniffer/format-sniffer';

const log = createLogger('Ingestion');

export interface IngestionSettings {
  reingestPolicy: ReingestPolicy;
  sniff: SniffOptions;
  normalize: NormalizeOptions;
}

export type NormalizeAttempt =
  | { ok: true; result: NormalizationResult }
  | { ok: false; failure: IssueRecord };

/**
 * Sniff + normalize one file. Pure: the same bytes and settings always give the
 * same attempt.
 */
export function normalizeContent(
  content: Buffer,
  category: Category,
  aliases: AliasRegistry,
  settings: Pick<IngestionSettings, 'sniff' | 'normalize'>
): NormalizeAttempt {
  try {
    const sniff = sniffFormat(content, settings.sniff);
    const result = normalizeTable(sniff, { category, aliases, options: settings.normalize });
    return { ok: true, result };
  } catch (err) {
    if (!(err instanceof DataQualityError)) {
      log.error('Unexpected normalization failure', { category, error: err instanceof Error ? err.stack : String(err) });
    }
    return { ok: false, failure: toIssue(err) };
  }
}

export function hashContent(content: Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export class IngestionService implements IngestionContract {
  constructor(
    private db: Knex,
    private archiveRepo: ArchiveRepo,
    private counterRepo: CounterRepo,
    private aliases: AliasRegistry,
    private settings: IngestionSettings
  ) {}

  async ingest(params: IngestParams): Promise<IngestOutcome> {
    const { category, filename, content } = params;
    const contentHash = hashContent(content);

    // 1. Normalize outside the transaction; never throws
    const attempt = normalizeContent(content, category, this.aliases, this.settings);
    const rowCount = attempt.ok ? attempt.result.table.rows.length : 0;
    const skippedRows = attempt.ok ? attempt.result.skippedRows : 0;
    const issues = attempt.ok ? attempt.result.issues : [attempt.failure];

    // 2. Dedup check, index reservation and both writes commit together. The
    //    counter lock comes first so concurrent ingests of one file see each other.
    const outcome = await this.db.transaction(async (trx): Promise<IngestOutcome> => {
      await this.counterRepo.lock(trx, category);
      const existing = await this.archiveRepo.findByContent(trx, category, filename, contentHash);
      if (existing && this.settings.reingestPolicy === 'skip') {
        return { status: 'duplicate', entry: existing, rowCount, skippedRows, issues };
      }

      const version = (await this.archiveRepo.latestVersion(trx, category, filename)) + 1;
      const index = await this.counterRepo.reserve(trx, category);

      const entry: ArchiveEntry = {
        id: uuidv4(),
        category,
        index,
        filename,
        contentHash,
        byteSize: content.length,
        version,
        status: attempt.ok ? 'normalized' : 'raw_only',
        failure: attempt.ok ? null : attempt.failure,
        ingestedAt: new Date().toISOString(),
      };

      await this.archiveRepo.insert(trx, {
        entry,
        content,
        clean: attempt.ok
          ? { table: attempt.result.table, skippedRows, issues: attempt.result.issues }
          : null,
      });

      return { status: entry.status, entry, rowCount, skippedRows, issues };
    });

    // 3. Report
    const { entry } = outcome;
    if (outcome.status === 'duplicate') {
      log.info(`Skipped ${filename}: identical to ${category} #${entry.index}`);
    } else if (outcome.status === 'raw_only') {
      log.warn(`Archived ${filename} as ${category} #${entry.index} (raw only)`, {
        failure: entry.failure?.code,
        message: entry.failure?.message,
      });
    } else {
      log.info(`Archived ${filename} as ${category} #${entry.index}`, {
        version: entry.version,
        rows: rowCount,
        skippedRows,
        issues: issues.length,
      });
    }
    return outcome;
  }
}
