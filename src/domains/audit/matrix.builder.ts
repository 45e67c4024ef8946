// ──────────────────────────────────────────
// Audit: matrix builder — presence, orphans, conflicts
// ──────────────────────────────────────────

import { IdentifierConflictError } from '../../shared/errors';
import {
  AuditConflict,
  AuditInput,
  AuditMatrix,
  CATEGORIES,
  EntryRef,
  MatrixKind,
  MatrixRow,
} from '../../shared/types';

export interface MatrixOptions {
  /** Distinct categories an identifier must appear in to be correlatable. */
  minCategories: number;
  /** Apply the orphan rule to counters as well as identifiers. */
  correlateCounters: boolean;
}

interface Accumulator {
  kind: MatrixKind;
  group: string;
  value: string;
  entries: EntryRef[];
  conflict: boolean;
}

export function compareEntries(a: EntryRef, b: EntryRef): number {
  const byCategory = CATEGORIES.indexOf(a.category) - CATEGORIES.indexOf(b.category);
  return byCategory !== 0 ? byCategory : a.index - b.index;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareRows(a: MatrixRow, b: MatrixRow): number {
  if (a.kind !== b.kind) return a.kind === 'identifier' ? -1 : 1;
  return compareText(a.group, b.group) || compareText(a.value, b.value);
}

export function buildAuditMatrix(
  inputs: AuditInput[],
  options: MatrixOptions,
  skipped: EntryRef[] = []
): AuditMatrix {
  const acc = new Map<string, Accumulator>();
  const conflicts: AuditConflict[] = [];

  const touch = (kind: MatrixKind, group: string, value: string, entry: EntryRef, conflict: boolean) => {
    const key = `${kind}\u0000${group}\u0000${value}`;
    let cell = acc.get(key);
    if (!cell) {
      cell = { kind, group, value, entries: [], conflict: false };
      acc.set(key, cell);
    }
    cell.entries.push(entry);
    if (conflict) cell.conflict = true;
  };

  for (const { entry, set } of inputs) {
    for (const [group, values] of set.identifiers) {
      const ambiguous = set.conflicted.get(group);
      for (const value of values) {
        touch('identifier', group, value, entry, ambiguous?.has(value) ?? false);
      }
    }
    for (const counter of set.counters) {
      touch('counter', 'counter', counter, entry, false);
    }
    for (const c of set.conflicts) {
      conflicts.push({ ...c, entry, issue: new IdentifierConflictError(c.column, c.groups).toIssue() });
    }
  }

  const counterBearing = inputs.filter((i) => i.set.counters.size > 0).length;

  const rows: MatrixRow[] = [...acc.values()].map((cell) => {
    const entries = [...cell.entries].sort(compareEntries);
    const categories = CATEGORIES.filter((c) => entries.some((e) => e.category === c));
    const population = cell.kind === 'counter' ? counterBearing : inputs.length;
    const checked = cell.kind === 'identifier' || options.correlateCounters;

    return {
      kind: cell.kind,
      group: cell.group,
      value: cell.value,
      entries,
      categories,
      coverage: population > 0 ? entries.length / population : 0,
      conflict: cell.conflict,
      orphan: checked && categories.length < options.minCategories,
      sparse: cell.kind === 'counter' && entries.length === 1 && counterBearing > 1,
    };
  });
  rows.sort(compareRows);

  conflicts.sort((a, b) => compareEntries(a.entry, b.entry) || compareText(a.column, b.column));

  return {
    rows,
    orphans: rows.filter((r) => r.orphan),
    conflicts,
    scanned: inputs.map((i) => i.entry).sort(compareEntries),
    skipped: [...skipped].sort(compareEntries),
  };
}
