// ──────────────────────────────────────────
// Ingestion: value normalizer — sniffed text → CleanTable
// ──────────────────────────────────────────

import { NormalizeOptions } from '../../../config';
import { AliasRegistry } from '../../../shared/aliases';
import { CellCoercionError, EmptyInputError, RowShapeError } from '../../../shared/errors';
import {
  Category,
  CellValue,
  CleanRow,
  ColumnProfile,
  DelimiterRule,
  IssueRecord,
  NormalizationResult,
  SniffResult,
} from '../../../shared/types';
import { canonicalColumnNames } from './column-names';
import { DatePattern, findDatePattern, parseDate, pickDatePattern } from './date-patterns';
import { parseNumber } from './numeric';

const NULL_TOKENS = new Set(['', 'null', 'n/a', 'na', 'nil', '-', '#n/a']);

export interface NormalizeContext {
  category: Category;
  aliases: AliasRegistry;
  options: NormalizeOptions;
}

interface AcceptedRow {
  /** 1-based line number in the source file. */
  line: number;
  tokens: string[];
}

export function isNullToken(token: string): boolean {
  return NULL_TOKENS.has(token.trim().toLowerCase());
}

export function normalizeTable(sniff: SniffResult, ctx: NormalizeContext): NormalizationResult {
  const rule = sniff.delimiterRule;
  const issues: IssueRecord[] = [...sniff.issues];
  const accepted: AcceptedRow[] = [];
  let skippedRows = 0;

  for (const source of sniff.dataRecords) {
    const tokens = source.tokens;
    if (tokens.length !== sniff.columnCount) {
      skippedRows++;
      issues.push(new RowShapeError(source.line + 1, sniff.columnCount, tokens.length).toIssue());
      continue;
    }
    accepted.push({ line: source.line + 1, tokens });
  }

  if (accepted.length === 0) {
    throw new EmptyInputError(
      skippedRows > 0
        ? `No data row matches the ${sniff.columnCount}-column header (${skippedRows} malformed)`
        : 'File has a header but no data rows'
    );
  }

  const names = canonicalColumnNames(sniff.header);
  const columns = names.map((name, col) =>
    profileColumn(name, sniff.header[col], accepted.map((r) => r.tokens[col]), rule, ctx)
  );

  const rows = accepted.map((r) => {
    const row: CleanRow = {};
    columns.forEach((column, col) => {
      row[column.name] = coerceCell(r.tokens[col], column, rule, r.line, issues);
    });
    return row;
  });

  return {
    table: {
      columns,
      rows,
      provenance: {
        encoding: sniff.encoding,
        delimiterRule: rule.name,
        delimiterFallback: sniff.delimiterFallback,
        decimalSeparator: rule.decimalSeparator,
        thousandsSeparator: rule.thousandsSeparator,
        headerLine: sniff.headerLine,
        synthesizedHeader: sniff.synthesizedHeader,
        preambleLines: sniff.preambleLines,
      },
    },
    skippedRows,
    issues,
  };
}

function profileColumn(
  name: string,
  source: string,
  tokens: string[],
  rule: DelimiterRule,
  ctx: NormalizeContext
): ColumnProfile {
  const groups = ctx.aliases.matchGroups(name, ctx.category);
  if (groups.length > 0) {
    return { name, source, kind: 'identifier', rule: `alias:${groups.join('|')}` };
  }

  const values = tokens.filter((t) => !isNullToken(t)).map((t) => t.trim());
  if (values.length === 0) {
    return { name, source, kind: 'text', rule: 'empty' };
  }

  const datePattern = pickDatePattern(values.slice(0, ctx.options.dateSampleRows));
  if (datePattern) {
    return { name, source, kind: 'date', rule: datePattern.name };
  }

  let numeric = 0;
  let fractional = false;
  for (const v of values) {
    const parsed = parseNumber(v, rule);
    if (!parsed) continue;
    numeric++;
    if (!parsed.integer) fractional = true;
  }
  if (numeric > 0 && numeric / values.length >= ctx.options.numericColumnRatio) {
    return { name, source, kind: fractional ? 'float' : 'integer', rule: 'numeric' };
  }

  return { name, source, kind: 'text', rule: 'text' };
}

function coerceCell(
  token: string,
  column: ColumnProfile,
  rule: DelimiterRule,
  line: number,
  issues: IssueRecord[]
): CellValue {
  if (isNullToken(token)) return null;
  const value = token.trim();

  switch (column.kind) {
    case 'identifier':
    case 'text':
      return value;
    case 'date': {
      const pattern: DatePattern | undefined = findDatePattern(column.rule);
      const parsed = pattern ? parseDate(value, pattern) : null;
      if (parsed) return parsed;
      issues.push(new CellCoercionError(line, column.name, value, `date (${column.rule})`).toIssue());
      return null;
    }
    case 'integer':
    case 'float': {
      const parsed = parseNumber(value, rule);
      if (parsed) return parsed.value;
      issues.push(new CellCoercionError(line, column.name, value, 'number').toIssue());
      return null;
    }
  }
}
