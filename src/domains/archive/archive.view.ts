// ──────────────────────────────────────────
// Archive: plain-text views for list / show
// ──────────────────────────────────────────

import { ArchiveEntry, CATEGORIES, Category, CellValue, CleanRow, StoredCleanTable } from '../../shared/types';

const RULE = '-'.repeat(30);

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
  }
  return String(value);
}

/** Left-aligned columns, two spaces apart, trailing blanks trimmed. */
export function formatGrid(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => row.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd());
}

export function renderEntries(entries: ArchiveEntry[], categories: readonly Category[] = CATEGORIES): string {
  const lines: string[] = [];
  for (const category of categories) {
    lines.push(`${category.toUpperCase()} ARCHIVE`);
    const own = entries.filter((e) => e.category === category);
    if (own.length === 0) {
      lines.push('  (No files found)');
      continue;
    }
    const grid = formatGrid(
      own.map((e) => [
        `[${e.index}]`,
        e.filename,
        `v${e.version}`,
        e.status,
        e.failure ? e.failure.code : '',
      ])
    );
    lines.push(...grid.map((l) => `  ${l}`));
  }
  return lines.join('\n');
}

export interface TableView {
  columns: string[];
  rows: CleanRow[];
}

/** Concatenates a category's tables; columns are the union in first-seen order. */
export function aggregateTables(tables: StoredCleanTable[]): TableView {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const { table } of tables) {
    for (const c of table.columns) {
      if (!seen.has(c.name)) {
        seen.add(c.name);
        columns.push(c.name);
      }
    }
  }

  const rows = tables.flatMap(({ table }) =>
    table.rows.map((row) => {
      const full: CleanRow = {};
      for (const c of columns) full[c] = row[c] ?? null;
      return full;
    })
  );

  return { columns, rows };
}

export function renderTable(view: TableView, limit: number): string {
  const body = formatGrid([
    view.columns,
    ...view.rows.slice(0, Math.max(0, limit)).map((row) => view.columns.map((c) => formatCell(row[c]))),
  ]);
  return [
    RULE,
    ...body,
    RULE,
    `Summary: ${view.rows.length} rows | Columns: ${view.columns.join(', ')}`,
  ].join('\n');
}
