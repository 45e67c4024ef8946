// ──────────────────────────────────────────
// Ingestion: line splitting + CSV record parsing
// ──────────────────────────────────────────

import Papa from 'papaparse';
import { RowShapeError } from '../../../shared/errors';
import { IssueRecord, SourceLine, SourceRecord } from '../../../shared/types';

const QUOTE = '"';
const NEWLINE = /\r\n|\n|\r/g;

export function splitLines(text: string): SourceLine[] {
  return text.split(NEWLINE).map((line, index) => ({ line: index, text: line }));
}

export function nonEmptyLines(text: string): SourceLine[] {
  return splitLines(text).filter((l) => l.text.trim() !== '');
}

/**
 * Counts delimiter occurrences outside double-quoted sections of one physical line.
 */
export function countDelimiters(line: string, delimiter: string): number {
  let count = 0;
  let quoted = false;
  for (const ch of line) {
    if (ch === QUOTE) quoted = !quoted;
    else if (!quoted && ch === delimiter) count++;
  }
  return count;
}

export interface ParsedRecords {
  /** Non-blank records; `line` is where each one starts (0-based). */
  records: SourceRecord[];
  issues: IssueRecord[];
}

function lineBreaks(tokens: string[]): number {
  return tokens.reduce((n, token) => n + (token.match(NEWLINE)?.length ?? 0), 0);
}

function isBlank(tokens: string[]): boolean {
  return tokens.length === 1 && tokens[0].trim() === '';
}

/**
 * Splits decoded text into records with the chosen delimiter. Quoted fields may
 * span lines; tokens keep their surrounding whitespace.
 */
export function parseRecords(text: string, delimiter: string): ParsedRecords {
  const parsed = Papa.parse<string[]>(text.replace(/\r\n?/g, '\n'), {
    delimiter,
    newline: '\n',
    quoteChar: QUOTE,
    skipEmptyLines: false,
  });

  const starts: number[] = [];
  const records: SourceRecord[] = [];
  let line = 0;
  for (const tokens of parsed.data) {
    starts.push(line);
    if (!isBlank(tokens)) records.push({ line, tokens });
    line += 1 + lineBreaks(tokens);
  }

  const lineOf = (row: number | undefined): number | undefined => {
    const start = row === undefined ? undefined : starts[row];
    return start === undefined ? undefined : start + 1;
  };
  const issues = parsed.errors
    .filter((err) => err.type === 'Quotes')
    .map((err) => RowShapeError.quoting(lineOf(err.row), err.message));

  return { records, issues };
}
