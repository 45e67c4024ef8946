// ──────────────────────────────────────────
// Ingestion: vendor date patterns
// ──────────────────────────────────────────

import { isValid, parse } from 'date-fns';

export interface DatePattern {
  name: string;
  /** date-fns format strings, most specific first. */
  formats: string[];
}

const TIME_SUFFIXES = [" HH:mm:ss", " HH:mm", "'T'HH:mm:ss", "'T'HH:mm", ''];
const MIN_YEAR = 1000;

function pattern(name: string, date: string): DatePattern {
  return { name, formats: TIME_SUFFIXES.map((time) => `${date}${time}`) };
}

/**
 * Evaluation order matters: day-first variants are tried before month-first ones,
 * so an all-ambiguous column (every day ≤ 12) reads as D/M/Y.
 */
export const DATE_PATTERNS: readonly DatePattern[] = [
  pattern('iso', 'yyyy-MM-dd'),
  pattern('iso-slash', 'yyyy/MM/dd'),
  pattern('dmy-slash', 'dd/MM/yyyy'),
  pattern('mdy-slash', 'MM/dd/yyyy'),
  pattern('dmy-dot', 'dd.MM.yyyy'),
  pattern('dmy-dash', 'dd-MM-yyyy'),
  pattern('mdy-dash', 'MM-dd-yyyy'),
];

// Fixed reference: fields a format leaves out never depend on the clock
const REFERENCE = new Date(2000, 0, 1);

/**
 * Parses as UTC; returns null for shape mismatches and impossible calendar dates.
 * date-fns reads the wall-clock fields in local time, they are re-read as UTC.
 */
export function parseDate(token: string, p: DatePattern): Date | null {
  const value = token.trim();
  for (const format of p.formats) {
    const local = parse(value, format, REFERENCE);
    if (!isValid(local) || local.getFullYear() < MIN_YEAR) continue;
    return new Date(
      Date.UTC(
        local.getFullYear(),
        local.getMonth(),
        local.getDate(),
        local.getHours(),
        local.getMinutes(),
        local.getSeconds()
      )
    );
  }
  return null;
}

export function findDatePattern(name: string): DatePattern | undefined {
  return DATE_PATTERNS.find((p) => p.name === name);
}

/**
 * First pattern that parses every sampled value. One pattern per column keeps a
 * table from mixing D/M and M/D readings.
 */
export function pickDatePattern(samples: string[]): DatePattern | null {
  if (samples.length === 0) return null;
  for (const p of DATE_PATTERNS) {
    if (samples.every((s) => parseDate(s, p) !== null)) return p;
  }
  return null;
}
