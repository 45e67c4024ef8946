// ──────────────────────────────────────────
// Archive: CleanTable ⇄ stored JSON columns
// ──────────────────────────────────────────

import { z } from 'zod';
import { CellValue, CleanRow, CleanTable, ColumnProfile, IssueRecord, TableProvenance } from '../../shared/types';

const columnSchema = z.object({
  name: z.string(),
  source: z.string(),
  kind: z.enum(['identifier', 'integer', 'float', 'date', 'text']),
  rule: z.string(),
});

const provenanceSchema = z.object({
  encoding: z.enum(['utf-8', 'latin1']),
  delimiterRule: z.enum(['semicolon', 'comma', 'tab']),
  delimiterFallback: z.boolean(),
  decimalSeparator: z.string(),
  thousandsSeparator: z.string(),
  headerLine: z.number().int(),
  synthesizedHeader: z.boolean(),
  preambleLines: z.number().int(),
});

export const issueSchema = z.object({
  code: z.enum([
    'EmptyInputError',
    'EncodingError',
    'RowShapeError',
    'CellCoercionError',
    'IdentifierConflictError',
    'NormalizationError',
  ]),
  message: z.string(),
  fatal: z.boolean(),
  line: z.number().int().optional(),
  column: z.string().optional(),
  token: z.string().optional(),
});

const rowsSchema = z.array(z.array(z.union([z.string(), z.number(), z.null()])));

export interface EncodedCleanTable {
  columns: string;
  row_data: string;
  provenance: string;
}

/** Rows are stored positionally in column order; dates as ISO-8601 strings. */
export function encodeCleanTable(table: CleanTable): EncodedCleanTable {
  const rows = table.rows.map((row) =>
    table.columns.map((c) => {
      const value = row[c.name] ?? null;
      return value instanceof Date ? value.toISOString() : value;
    })
  );
  return {
    columns: JSON.stringify(table.columns),
    row_data: JSON.stringify(rows),
    provenance: JSON.stringify(table.provenance),
  };
}

export function decodeCleanTable(stored: EncodedCleanTable): CleanTable {
  const columns: ColumnProfile[] = z.array(columnSchema).parse(JSON.parse(stored.columns));
  const provenance: TableProvenance = provenanceSchema.parse(JSON.parse(stored.provenance));
  const rawRows = rowsSchema.parse(JSON.parse(stored.row_data));

  const rows = rawRows.map((values) => {
    const row: CleanRow = {};
    columns.forEach((c, i) => {
      row[c.name] = reviveCell(values[i] ?? null, c);
    });
    return row;
  });

  return { columns, rows, provenance };
}

function reviveCell(value: string | number | null, column: ColumnProfile): CellValue {
  if (column.kind === 'date' && typeof value === 'string') {
    return new Date(value);
  }
  return value;
}

export function encodeIssues(issues: IssueRecord[]): string {
  return JSON.stringify(issues);
}

export function decodeIssues(raw: string): IssueRecord[] {
  return z.array(issueSchema).parse(JSON.parse(raw));
}

export function decodeIssue(raw: string | null): IssueRecord | null {
  return raw === null ? null : issueSchema.parse(JSON.parse(raw));
}
