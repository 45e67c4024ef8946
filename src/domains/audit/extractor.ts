// ──────────────────────────────────────────
// Audit: identifier / counter extractor
// ──────────────────────────────────────────

import { AliasRegistry } from '../../shared/aliases';
import {
  Category,
  CellValue,
  CleanTable,
  ColumnProfile,
  DelimiterRule,
  IdentifierConflict,
  IdentifierSet,
} from '../../shared/types';
import { getRule } from '../ingestion/sniffer/delimiter-rules';
import { isNumeric } from '../ingestion/normalizer/numeric';

export interface ExtractOptions {
  counterNumericRatio: number;
}

function addTo(map: Map<string, Set<string>>, key: string, value: string): void {
  const set = map.get(key) ?? new Set<string>();
  set.add(value);
  map.set(key, set);
}

export function cellText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = value instanceof Date ? value.toISOString() : String(value).trim();
  return text === '' ? null : text;
}

/**
 * Numeric columns qualify outright. Text columns qualify when enough of their
 * values still read as numbers under the table's own decimal convention, which
 * catches counters the normalizer left as text because of a few bad cells.
 */
function isCounterColumn(column: ColumnProfile, table: CleanTable, rule: DelimiterRule, ratio: number): boolean {
  if (column.kind === 'integer' || column.kind === 'float') {
    return table.rows.some((row) => typeof row[column.name] === 'number');
  }
  if (column.kind !== 'text') return false;

  let present = 0;
  let numeric = 0;
  for (const row of table.rows) {
    const value = row[column.name];
    if (typeof value !== 'string' || value === '') continue;
    present++;
    if (isNumeric(value, rule)) numeric++;
  }
  return numeric / present > ratio;
}

export function extractIdentifiers(
  table: CleanTable,
  category: Category,
  aliases: AliasRegistry,
  options: ExtractOptions
): IdentifierSet {
  const identifiers = new Map<string, Set<string>>();
  const conflicted = new Map<string, Set<string>>();
  const identifierColumns = new Map<string, Set<string>>();
  const counters = new Set<string>();
  const conflicts: IdentifierConflict[] = [];
  const rule = getRule(table.provenance.delimiterRule);

  for (const column of table.columns) {
    const groups = aliases.matchGroups(column.name, category);

    if (groups.length > 0) {
      const ambiguous = groups.length > 1;
      if (ambiguous) conflicts.push({ column: column.name, groups });

      for (const group of groups) {
        addTo(identifierColumns, group, column.name);
        for (const row of table.rows) {
          const value = cellText(row[column.name]);
          if (value === null) continue;
          addTo(identifiers, group, value);
          if (ambiguous) addTo(conflicted, group, value);
        }
      }
      continue;
    }

    if (aliases.isCounterNameColumn(column.name)) {
      // Long format: one counter per row, named in this column
      for (const row of table.rows) {
        const value = cellText(row[column.name]);
        if (value !== null) counters.add(value);
      }
      continue;
    }

    if (aliases.isNonCounterColumn(column.name)) continue;

    if (isCounterColumn(column, table, rule, options.counterNumericRatio)) {
      counters.add(column.name);
    }
  }

  return { identifiers, conflicted, counters, identifierColumns, conflicts };
}
