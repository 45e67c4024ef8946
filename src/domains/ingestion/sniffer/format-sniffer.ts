// ──────────────────────────────────────────
// Ingestion: format sniffer — encoding, delimiter, header row
// ──────────────────────────────────────────

import { SniffOptions } from '../../../config';
import { EmptyInputError } from '../../../shared/errors';
import { DelimiterRule, SniffResult, SourceRecord } from '../../../shared/types';
import { isNumeric } from '../normalizer/numeric';
import { chooseDelimiter } from './delimiter-rules';
import { decodeContent } from './encoding';
import { nonEmptyLines, parseRecords } from './tokenizer';

export function sniffFormat(content: Buffer, options: SniffOptions): SniffResult {
  const decoded = decodeContent(content, options.encodingFallback);
  const lines = nonEmptyLines(decoded.text);
  if (lines.length === 0) {
    throw new EmptyInputError('File has no non-empty lines');
  }

  const choice = chooseDelimiter(lines.slice(0, options.sampleLines));
  const parsed = parseRecords(decoded.text, choice.rule.delimiter);
  const records = parsed.records;
  const tokenized = records.slice(0, options.sampleLines).map((r) => r.tokens);
  const columnCount = modeTokenCount(tokenized);

  const headerAt = tokenized.findIndex(
    (tokens) => tokens.length === columnCount && looksLikeHeader(tokens, choice.rule)
  );

  let header: string[];
  let headerLine: number;
  let dataRecords: SourceRecord[];
  let preambleLines: number;

  if (headerAt === -1) {
    header = Array.from({ length: columnCount }, (_, i) => `col_${i + 1}`);
    headerLine = 0;
    dataRecords = records;
    preambleLines = 0;
  } else {
    header = tokenized[headerAt];
    headerLine = records[headerAt].line;
    dataRecords = records.slice(headerAt + 1);
    preambleLines = headerAt;
  }

  return {
    encoding: decoded.encoding,
    delimiterRule: choice.rule,
    delimiterFallback: choice.fallback,
    scores: choice.scores,
    columnCount,
    headerLine,
    synthesizedHeader: headerAt === -1,
    header,
    dataRecords,
    preambleLines,
    issues: [...decoded.issues, ...parsed.issues],
  };
}

/** Most frequent token count; ties resolve to the wider row. */
function modeTokenCount(rows: string[][]): number {
  const freq = new Map<number, number>();
  for (const tokens of rows) {
    freq.set(tokens.length, (freq.get(tokens.length) ?? 0) + 1);
  }
  let best = 1;
  let bestFreq = 0;
  for (const [count, n] of freq) {
    if (n > bestFreq || (n === bestFreq && count > best)) {
      best = count;
      bestFreq = n;
    }
  }
  return best;
}

function looksLikeHeader(tokens: string[], rule: DelimiterRule): boolean {
  return tokens.some((t) => t.trim() !== '' && !isNumeric(t, rule));
}
