import { describe, expect, it } from 'vitest';
import { CleanTable, ColumnProfile, ColumnKind } from '../../shared/types';
import { testAliases } from '../../testing/fixtures';
import { cellText, extractIdentifiers } from './extractor';

const aliases = testAliases();
const options = { counterNumericRatio: 0.5 };

function column(name: string, kind: ColumnKind): ColumnProfile {
  return { name, source: name, kind, rule: kind };
}

function table(columns: ColumnProfile[], rows: CleanTable['rows']): CleanTable {
  return {
    columns,
    rows,
    provenance: {
      encoding: 'utf-8',
      delimiterRule: 'comma',
      delimiterFallback: false,
      decimalSeparator: '.',
      thousandsSeparator: ',',
      headerLine: 0,
      synthesizedHeader: false,
      preambleLines: 0,
    },
  };
}

describe('extractIdentifiers', () => {
  it('collects identifier values and counter columns', () => {
    const set = extractIdentifiers(
      table(
        [
          column('Cell ID', 'identifier'),
          column('Date', 'date'),
          column('pmA', 'integer'),
          column('pmB', 'text'),
          column('Note', 'text'),
          column('Latitude', 'float'),
          column('Empty', 'integer'),
        ],
        [
          { 'Cell ID': 'CellA', Date: new Date(0), pmA: 1, pmB: '1.5', Note: 'x', Latitude: 1.5, Empty: null },
          { 'Cell ID': 'CellB', Date: new Date(0), pmA: 2, pmB: '2.5', Note: 'y', Latitude: 2.5, Empty: null },
          { 'Cell ID': null, Date: null, pmA: null, pmB: 'oops', Note: null, Latitude: null, Empty: null },
        ]
      ),
      'pm',
      aliases,
      options
    );

    expect([...(set.identifiers.get('cell_id') ?? [])]).toEqual(['CellA', 'CellB']);
    expect([...set.counters].sort()).toEqual(['pmA', 'pmB']);
    expect([...(set.identifierColumns.get('cell_id') ?? [])]).toEqual(['Cell ID']);
    expect(set.conflicts).toEqual([]);
    expect(set.conflicted.size).toBe(0);
  });

  it('needs a numeric majority before a text column counts as a counter', () => {
    const set = extractIdentifiers(
      table(
        [column('Half', 'text'), column('Most', 'text')],
        [
          { Half: '1', Most: '1' },
          { Half: 'x', Most: '2' },
          { Half: '3', Most: '3' },
          { Half: 'y', Most: 'z' },
        ]
      ),
      'pm',
      aliases,
      options
    );

    expect([...set.counters]).toEqual(['Most']);
  });

  it('records an ambiguous column under every matching group', () => {
    const set = extractIdentifiers(table([column('Cell', 'identifier')], [{ Cell: 'X1' }]), 'pm', aliases, options);

    expect([...(set.identifiers.get('cell_id') ?? [])]).toEqual(['X1']);
    expect([...(set.identifiers.get('cell_name') ?? [])]).toEqual(['X1']);
    expect(set.conflicted.get('cell_id')?.has('X1')).toBe(true);
    expect(set.conflicts).toEqual([{ column: 'Cell', groups: ['cell_id', 'cell_name'] }]);
  });

  it('reads counter names from a long-format name column', () => {
    const set = extractIdentifiers(
      table(
        [column('Cell ID', 'identifier'), column('Counter', 'text')],
        [
          { 'Cell ID': 'CellA', Counter: 'pmX' },
          { 'Cell ID': 'CellA', Counter: 'pmY' },
          { 'Cell ID': 'CellB', Counter: 'pmX' },
        ]
      ),
      'pm',
      aliases,
      options
    );

    expect([...set.counters].sort()).toEqual(['pmX', 'pmY']);
  });

  it('applies category-scoped alias groups', () => {
    const t = table([column('PCI', 'integer')], [{ PCI: 101 }]);

    expect(extractIdentifiers(t, 'cm', aliases, options).identifiers.get('serving_pci')?.has('101')).toBe(true);
    const inPm = extractIdentifiers(t, 'pm', aliases, options);
    expect(inPm.identifiers.size).toBe(0);
    expect([...inPm.counters]).toEqual(['PCI']);
  });
});

describe('cellText', () => {
  it('renders dates as ISO and drops blanks', () => {
    expect(cellText(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    expect(cellText('  ')).toBeNull();
    expect(cellText(42)).toBe('42');
  });
});
