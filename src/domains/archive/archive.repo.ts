// ──────────────────────────────────────────
// Archive: entry, raw and clean record repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { ArchiveContract } from '../../shared/contracts';
import { ArchiveNotFoundError } from '../../shared/errors';
import {
  ArchiveEntry,
  CATEGORIES,
  Category,
  CleanTable,
  EntryStatus,
  IssueRecord,
  RawRecord,
  StoredCleanTable,
} from '../../shared/types';
import { decodeCleanTable, decodeIssue, decodeIssues, encodeCleanTable, encodeIssues } from './clean-table.codec';

interface EntryRow {
  id: string;
  category: string;
  entry_index: number;
  filename: string;
  content_hash: string;
  byte_size: number;
  version: number;
  status: string;
  failure: string | null;
  ingested_at: string;
}

interface RawRow {
  entry_id: string;
  content: Buffer;
}

interface CleanRow {
  entry_id: string;
  columns: string;
  row_data: string;
  provenance: string;
  issues: string;
  row_count: number;
  skipped_rows: number;
}

export interface NewEntry {
  entry: ArchiveEntry;
  content: Buffer;
  clean: { table: CleanTable; skippedRows: number; issues: IssueRecord[] } | null;
}

function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

function toEntry(row: EntryRow): ArchiveEntry {
  if (!isCategory(row.category)) {
    throw new Error(`Archive entry ${row.id} has unknown category "${row.category}"`);
  }
  const status: EntryStatus = row.status === 'normalized' ? 'normalized' : 'raw_only';
  return {
    id: row.id,
    category: row.category,
    index: Number(row.entry_index),
    filename: row.filename,
    contentHash: row.content_hash,
    byteSize: Number(row.byte_size),
    version: Number(row.version),
    status,
    failure: decodeIssue(row.failure),
    ingestedAt: row.ingested_at,
  };
}

export class ArchiveRepo implements ArchiveContract {
  constructor(private db: Knex) {}

  async insert(trx: Knex.Transaction, { entry, content, clean }: NewEntry): Promise<void> {
    await trx<EntryRow>('archive_entries').insert({
      id: entry.id,
      category: entry.category,
      entry_index: entry.index,
      filename: entry.filename,
      content_hash: entry.contentHash,
      byte_size: entry.byteSize,
      version: entry.version,
      status: entry.status,
      failure: entry.failure ? JSON.stringify(entry.failure) : null,
      ingested_at: entry.ingestedAt,
    });

    await trx<RawRow>('raw_records').insert({ entry_id: entry.id, content });

    if (clean) {
      await trx<CleanRow>('clean_tables').insert({
        entry_id: entry.id,
        ...encodeCleanTable(clean.table),
        issues: encodeIssues(clean.issues),
        row_count: clean.table.rows.length,
        skipped_rows: clean.skippedRows,
      });
    }
  }

  async findByContent(
    conn: Knex,
    category: Category,
    filename: string,
    contentHash: string
  ): Promise<ArchiveEntry | null> {
    const row = await conn<EntryRow>('archive_entries')
      .where({ category, filename, content_hash: contentHash })
      .orderBy('entry_index', 'asc')
      .first();
    return row ? toEntry(row) : null;
  }

  async latestVersion(conn: Knex, category: Category, filename: string): Promise<number> {
    const row = await conn<EntryRow>('archive_entries')
      .where({ category, filename })
      .orderBy('version', 'desc')
      .first();
    return row ? Number(row.version) : 0;
  }

  async listEntries(category?: Category): Promise<ArchiveEntry[]> {
    let query = this.db<EntryRow>('archive_entries')
      .orderBy([{ column: 'category', order: 'asc' }, { column: 'entry_index', order: 'asc' }]);
    if (category) {
      query = query.where('category', category);
    }
    const rows: EntryRow[] = await query;
    return rows.map(toEntry);
  }

  async getEntry(category: Category, index: number): Promise<ArchiveEntry> {
    const row = await this.db<EntryRow>('archive_entries')
      .where({ category, entry_index: index })
      .first();
    if (!row) throw new ArchiveNotFoundError(category, index);
    return toEntry(row);
  }

  async getRaw(category: Category, index: number): Promise<RawRecord> {
    const entry = await this.getEntry(category, index);
    const row = await this.db<RawRow>('raw_records').where('entry_id', entry.id).first();
    if (!row) throw new ArchiveNotFoundError(category, index, 'raw');
    return {
      category,
      index,
      filename: entry.filename,
      ingestedAt: entry.ingestedAt,
      content: Buffer.from(row.content),
    };
  }

  async getClean(category: Category, index: number): Promise<StoredCleanTable | null> {
    const entry = await this.getEntry(category, index);
    return this.loadClean(entry);
  }

  /** Null when the entry exists but its file never normalized. */
  async loadClean(entry: ArchiveEntry): Promise<StoredCleanTable | null> {
    const row = await this.db<CleanRow>('clean_tables').where('entry_id', entry.id).first();
    if (!row) return null;
    return {
      entry,
      table: decodeCleanTable(row),
      skippedRows: Number(row.skipped_rows),
      issues: decodeIssues(row.issues),
    };
  }
}
