// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import { ArchiveEntry, Category, IngestOutcome, IngestParams, RawRecord, StoredCleanTable } from './types';

/**
 * Archive contract — exposed to the Audit domain and the read surfaces.
 * Readers go through these methods and never write to the store directly.
 */
export interface ArchiveContract {
  listEntries(category?: Category): Promise<ArchiveEntry[]>;
  getEntry(category: Category, index: number): Promise<ArchiveEntry>;
  getRaw(category: Category, index: number): Promise<RawRecord>;
  getClean(category: Category, index: number): Promise<StoredCleanTable | null>;
  loadClean(entry: ArchiveEntry): Promise<StoredCleanTable | null>;
}

/**
 * Ingestion contract — the single write path into the archive,
 * used by the inbox scanner, the CLI and the HTTP ingest route.
 */
export interface IngestionContract {
  ingest(params: IngestParams): Promise<IngestOutcome>;
}
