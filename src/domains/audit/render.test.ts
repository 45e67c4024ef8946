import { describe, expect, it } from 'vitest';
import { AuditInput, Category, HeaderPresence } from '../../shared/types';
import { testAliases } from '../../testing/fixtures';
import { buildAuditMatrix } from './matrix.builder';
import { formatCoverage, renderAuditMatrix, renderHeaderMatrix } from './render';

const aliases = testAliases();

function input(category: Category, index: number, cells: string[], counters: string[]): AuditInput {
  return {
    entry: { category, index, filename: `${category}_${index}.csv` },
    set: {
      identifiers: new Map([['cell_id', new Set(cells)]]),
      conflicted: new Map(),
      counters: new Set(counters),
      identifierColumns: new Map(),
      conflicts: [],
    },
  };
}

const MATRIX = buildAuditMatrix(
  [input('pm', 0, ['CellA', 'CellB'], ['pmA', 'pmB']), input('pm', 1, ['CellA'], ['pmA']), input('cm', 0, ['CellA'], [])],
  { minCategories: 2, correlateCounters: false },
  [{ category: 'site', index: 0, filename: 'blank.csv' }]
);

describe('renderAuditMatrix', () => {
  it('lists identifiers with their categories and flags', () => {
    const lines = renderAuditMatrix(MATRIX, aliases, { showAll: false }).split('\n');

    expect(lines[0]).toBe('Analyzed 3 clean table(s), 1 skipped');
    expect(lines).toContain('Cell ID');
    expect(lines).toContain('  CellA  pm,cm  pm#0 pm#1 cm#0');
    expect(lines).toContain('  CellB  pm     pm#0            ORPHAN');
    expect(lines).toContain('  Cell ID CellB: only in pm');
  });

  it('hides single-file counters unless asked', () => {
    const hidden = renderAuditMatrix(MATRIX, aliases, { showAll: false }).split('\n');
    expect(hidden).toContain('  Counter  pm#0  pm#1  Coverage');
    expect(hidden).toContain('  pmA      X     X     100.0%');
    expect(hidden).toContain('... 1 more unique counters hidden. Use --show-all to see everything.');

    const all = renderAuditMatrix(MATRIX, aliases, { showAll: true }).split('\n');
    expect(all).toContain('  pmB      X     .     50.0%');
    expect(all.some((l) => l.startsWith('...'))).toBe(false);
  });

  it('lists skipped entries', () => {
    const lines = renderAuditMatrix(MATRIX, aliases, { showAll: false }).split('\n');
    expect(lines.slice(-2)).toEqual(['SKIPPED (no clean table)', '  site#0 blank.csv']);
  });
});

describe('renderHeaderMatrix', () => {
  it('marks presence per file index', () => {
    const text = renderHeaderMatrix(
      new Map<Category, HeaderPresence[]>([
        [
          'pm',
          [
            { header: 'Cell ID', indices: [0, 1] },
            { header: 'pmB', indices: [0] },
          ],
        ],
      ])
    );
    expect(text.split('\n')).toEqual([
      'PM HEADER MATRIX',
      'Header   0  1',
      'Cell ID  X  X',
      'pmB      X  .',
      '-'.repeat(40),
    ]);
  });

  it('says so when nothing is archived', () => {
    expect(renderHeaderMatrix(new Map())).toBe('(No clean files found)');
  });
});

describe('formatCoverage', () => {
  it('prints one decimal', () => {
    expect(formatCoverage(1 / 3)).toBe('33.3%');
  });
});
