// ──────────────────────────────────────────
// Audit: on-demand scan over the clean archive
// ──────────────────────────────────────────

import { AuditOptions } from '../../config';
import { createLogger } from '../../platform/logger';
import { AliasRegistry } from '../../shared/aliases';
import { ArchiveContract } from '../../shared/contracts';
import { AuditInput, AuditMatrix, Category, EntryRef, HeaderPresence } from '../../shared/types';
import { extractIdentifiers } from './extractor';
import { buildAuditMatrix } from './matrix.builder';

const log = createLogger('Audit');

export interface AuditScan {
  inputs: AuditInput[];
  skipped: EntryRef[];
  headers: Map<Category, HeaderPresence[]>;
}

export class AuditService {
  constructor(
    private archive: ArchiveContract,
    private aliases: AliasRegistry,
    private options: AuditOptions
  ) {}

  /**
   * Read-only pass. Entries committed after the listing are simply not part of
   * this run; listed entries without a clean table are reported as skipped.
   */
  async scan(category?: Category): Promise<AuditScan> {
    const entries = await this.archive.listEntries(category);
    const inputs: AuditInput[] = [];
    const skipped: EntryRef[] = [];
    const headerIndex = new Map<Category, Map<string, number[]>>();

    for (const entry of entries) {
      const ref: EntryRef = { category: entry.category, index: entry.index, filename: entry.filename };
      const stored = await this.archive.loadClean(entry);
      if (!stored) {
        skipped.push(ref);
        continue;
      }

      inputs.push({
        entry: ref,
        set: extractIdentifiers(stored.table, entry.category, this.aliases, this.options),
      });

      const byHeader = headerIndex.get(entry.category) ?? new Map<string, number[]>();
      for (const column of stored.table.columns) {
        const indices = byHeader.get(column.name) ?? [];
        indices.push(entry.index);
        byHeader.set(column.name, indices);
      }
      headerIndex.set(entry.category, byHeader);
    }

    const headers = new Map<Category, HeaderPresence[]>();
    for (const [cat, byHeader] of headerIndex) {
      headers.set(
        cat,
        [...byHeader.entries()]
          .map(([header, indices]) => ({ header, indices }))
          .sort((a, b) => (a.header < b.header ? -1 : a.header > b.header ? 1 : 0))
      );
    }

    return { inputs, skipped, headers };
  }

  async buildMatrix(): Promise<AuditMatrix> {
    const { inputs, skipped } = await this.scan();
    const matrix = buildAuditMatrix(inputs, this.options, skipped);
    log.info(`Audited ${matrix.scanned.length} clean table(s)`, {
      skipped: matrix.skipped.length,
      rows: matrix.rows.length,
      orphans: matrix.orphans.length,
      conflicts: matrix.conflicts.length,
    });
    return matrix;
  }

  async headerMatrix(category?: Category): Promise<Map<Category, HeaderPresence[]>> {
    const { headers } = await this.scan(category);
    return headers;
  }
}
