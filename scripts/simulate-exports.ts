// ──────────────────────────────────────────
// Simulator: writes vendor-style CSV exports into the inbox
//
// Usage:
//   npx tsx scripts/simulate-exports.ts [--cells 12] [--files 2]
//
// Each run drops PM, CM, site and RF files that share most cell
// identifiers, plus a few cells that only exist in one category.
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { faker } from '@faker-js/faker';
import { format } from 'date-fns';
import Papa from 'papaparse';
import { loadConfig } from '../src/config';
import { inboxPath } from '../src/domains/ingestion/inbox/inbox.scanner';
import { CATEGORIES, Category } from '../src/shared/types';

function argValue(flag: string, fallback: number): number {
  const i = process.argv.indexOf(flag);
  const parsed = i >= 0 ? parseInt(process.argv[i + 1] ?? '', 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const CELL_COUNT = argValue('--cells', 12);
const FILES_PER_CATEGORY = argValue('--files', 2);

const PM_COUNTERS = [
  'pmRrcConnEstabSucc',
  'pmRrcConnEstabAtt',
  'pmErabEstabSuccInit',
  'pmHoExeSuccLteIntraF',
  'pmPdcpVolDlDrb',
  'pmActiveUeDlSum',
];

interface Cell {
  id: string;
  site: string;
  pci: number;
}

function makeCells(count: number): Cell[] {
  return Array.from({ length: count }, () => {
    const site = `${faker.location.countryCode()}${faker.string.numeric(4)}`;
    return {
      id: `${site}_${faker.number.int({ min: 1, max: 3 })}${faker.string.numeric(2)}`,
      site,
      pci: faker.number.int({ min: 0, max: 503 }),
    };
  });
}

/** Semicolon exports use decimal commas; comma exports use decimal points. */
function formatDecimal(value: number, delimiter: string): string {
  const text = value.toFixed(2);
  return delimiter === ';' ? text.replace('.', ',') : text;
}

function csv(rows: string[][], delimiter: string): string {
  return Papa.unparse(rows, { delimiter, newline: '\n' });
}

function pmExport(cells: Cell[], delimiter: string): string {
  const counters = faker.helpers.arrayElements(PM_COUNTERS, { min: 3, max: PM_COUNTERS.length });
  const day = faker.date.recent({ days: 14 });
  const date = format(day, 'dd.MM.yyyy');
  const rows = cells.map((c) => [
    date,
    c.id,
    ...counters.map((name) =>
      name === 'pmPdcpVolDlDrb'
        ? formatDecimal(faker.number.float({ min: 1000, max: 90000 }), delimiter)
        : String(faker.number.int({ min: 0, max: 5000 }))
    ),
  ]);
  const preamble = [[`Report: ${faker.company.name()} PM export`]];
  return csv([...preamble, ['Date', 'EUtranCell Id', ...counters], ...rows], delimiter);
}

function cmExport(cells: Cell[], delimiter: string): string {
  const rows = cells.map((c) => [c.id, String(c.pci), String(faker.helpers.arrayElement([1300, 1850, 6300])), faker.helpers.arrayElement(['UNLOCKED', 'LOCKED'])]);
  return csv([['EUtranCellFDD', 'PCI', 'EARFCN', 'Admin State'], ...rows], delimiter);
}

function siteExport(cells: Cell[], delimiter: string): string {
  const rows = cells.map((c) => [
    c.site,
    c.id,
    formatDecimal(faker.location.latitude(), delimiter),
    formatDecimal(faker.location.longitude(), delimiter),
    String(faker.number.int({ min: 0, max: 359 })),
  ]);
  return csv([['Site ID', 'Cell ID', 'Latitude', 'Longitude', 'Azimuth'], ...rows], delimiter);
}

function rfExport(cells: Cell[], delimiter: string): string {
  const rows = cells.map((c) => [
    c.id,
    String(c.pci),
    formatDecimal(faker.number.float({ min: -120, max: -70 }), delimiter),
    formatDecimal(faker.number.float({ min: -15, max: 25 }), delimiter),
  ]);
  return csv([['Cell ID', 'Serving PCI', 'RSRP', 'SINR'], ...rows], delimiter);
}

const GENERATORS: Record<Category, (cells: Cell[], delimiter: string) => string> = {
  pm: pmExport,
  cm: cmExport,
  site: siteExport,
  rf: rfExport,
};

function main() {
  const config = loadConfig();
  const shared = makeCells(CELL_COUNT);

  let written = 0;
  for (const category of CATEGORIES) {
    const generate = GENERATORS[category];
    const dir = inboxPath(config.inboxDir, category);
    fs.mkdirSync(dir, { recursive: true });

    for (let i = 0; i < FILES_PER_CATEGORY; i++) {
      const delimiter = faker.helpers.arrayElement([';', ',']);
      const cells = [...faker.helpers.arrayElements(shared, { min: Math.ceil(shared.length / 2), max: shared.length }), ...makeCells(1)];
      const file = path.join(dir, `${category}_export_${Date.now()}_${i}.csv`);
      fs.writeFileSync(file, `${generate(cells, delimiter)}\n`);
      written++;
      console.log(`[Simulator] ${file}`);
    }
  }

  console.log(`[Simulator] Wrote ${written} file(s) into ${config.inboxDir}`);
}

main();
