// ──────────────────────────────────────────
// Audit: plain-text rendering for the kpi / headers commands
// ──────────────────────────────────────────

import { AliasRegistry } from '../../shared/aliases';
import { AuditMatrix, Category, EntryRef, HeaderPresence, MatrixRow } from '../../shared/types';
import { formatGrid } from '../archive/archive.view';
import { compareEntries } from './matrix.builder';

export function entryLabel(entry: EntryRef): string {
  return `${entry.category}#${entry.index}`;
}

function flags(row: MatrixRow): string {
  const out: string[] = [];
  if (row.orphan) out.push('ORPHAN');
  if (row.conflict) out.push('CONFLICT');
  if (row.sparse) out.push('SPARSE');
  return out.join(' ');
}

export function formatCoverage(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export interface RenderOptions {
  /** Include counters seen in a single file. */
  showAll: boolean;
}

export function renderAuditMatrix(matrix: AuditMatrix, aliases: AliasRegistry, options: RenderOptions): string {
  const lines: string[] = [
    `Analyzed ${matrix.scanned.length} clean table(s), ${matrix.skipped.length} skipped`,
    '',
    'IDENTIFIERS (Join Keys)',
  ];

  const identifiers = matrix.rows.filter((r) => r.kind === 'identifier');
  if (identifiers.length === 0) lines.push('  (none)');
  const groups = [...new Set(identifiers.map((r) => r.group))];
  for (const group of groups) {
    lines.push(aliases.label(group));
    const grid = formatGrid(
      identifiers
        .filter((r) => r.group === group)
        .map((r) => [r.value, r.categories.join(','), r.entries.map(entryLabel).join(' '), flags(r)])
    );
    lines.push(...grid.map((l) => `  ${l}`));
  }

  lines.push('', 'PERFORMANCE COUNTERS');
  const counters = matrix.rows.filter((r) => r.kind === 'counter');
  const shown = options.showAll ? counters : counters.filter((r) => !r.sparse);
  if (shown.length === 0) {
    lines.push('  (none)');
  } else {
    const columns = uniqueEntries(counters.flatMap((r) => r.entries));
    const grid = formatGrid([
      ['Counter', ...columns.map(entryLabel), 'Coverage'],
      ...shown.map((r) => [
        r.value,
        ...columns.map((c) => (r.entries.some((e) => e.category === c.category && e.index === c.index) ? 'X' : '.')),
        formatCoverage(r.coverage),
      ]),
    ]);
    lines.push(...grid.map((l) => `  ${l}`));
  }
  const hidden = counters.length - shown.length;
  if (hidden > 0) {
    lines.push(`... ${hidden} more unique counters hidden. Use --show-all to see everything.`);
  }

  if (matrix.orphans.length > 0) {
    lines.push('', `ORPHANS (${matrix.orphans.length})`);
    for (const r of matrix.orphans) {
      lines.push(`  ${aliases.label(r.group)} ${r.value}: only in ${r.categories.join(',')}`);
    }
  }

  if (matrix.conflicts.length > 0) {
    lines.push('', 'CONFLICTS');
    for (const c of matrix.conflicts) {
      lines.push(`  ${entryLabel(c.entry)} ${c.issue.message}`);
    }
  }

  if (matrix.skipped.length > 0) {
    lines.push('', 'SKIPPED (no clean table)');
    for (const s of matrix.skipped) {
      lines.push(`  ${entryLabel(s)} ${s.filename}`);
    }
  }

  return lines.join('\n');
}

function uniqueEntries(entries: EntryRef[]): EntryRef[] {
  const byKey = new Map<string, EntryRef>();
  for (const e of entries) byKey.set(entryLabel(e), e);
  return [...byKey.values()].sort(compareEntries);
}

export function renderHeaderMatrix(headers: Map<Category, HeaderPresence[]>): string {
  const lines: string[] = [];
  for (const [category, presence] of headers) {
    const indices = [...new Set(presence.flatMap((p) => p.indices))].sort((a, b) => a - b);
    lines.push(`${category.toUpperCase()} HEADER MATRIX`);
    const grid = formatGrid([
      ['Header', ...indices.map(String)],
      ...presence.map((p) => [p.header, ...indices.map((i) => (p.indices.includes(i) ? 'X' : '.'))]),
    ]);
    lines.push(...grid, '-'.repeat(40));
  }
  return lines.length ? lines.join('\n') : '(No clean files found)';
}
