// ──────────────────────────────────────────
// Ingestion: delimiter candidates + consistency scoring
// ──────────────────────────────────────────

import { DelimiterRule, DelimiterScore, SourceLine } from '../../../shared/types';
import { countDelimiters } from './tokenizer';

/**
 * Candidate rules in tie-break order. The decimal convention travels with the
 * delimiter: semicolon exports use comma decimals, the others use dot decimals.
 */
export const DELIMITER_RULES: readonly DelimiterRule[] = [
  { name: 'semicolon', delimiter: ';', decimalSeparator: ',', thousandsSeparator: '.' },
  { name: 'comma', delimiter: ',', decimalSeparator: '.', thousandsSeparator: ',' },
  { name: 'tab', delimiter: '\t', decimalSeparator: '.', thousandsSeparator: ',' },
];

const FALLBACK_RULE = 'comma';
const EPSILON = 1e-9;

export function getRule(name: DelimiterRule['name']): DelimiterRule {
  const rule = DELIMITER_RULES.find((r) => r.name === name);
  if (!rule) throw new Error(`Unknown delimiter rule: ${name}`);
  return rule;
}

/**
 * Relative variance (variance / mean²) of per-line delimiter counts, so a column
 * separator seen 20 times per line is not outscored by a decimal comma seen once.
 * A rule that never appears scores null and is not eligible.
 */
export function scoreRule(rule: DelimiterRule, lines: SourceLine[]): DelimiterScore {
  const counts = lines.map((l) => countDelimiters(l.text, rule.delimiter));
  const mean = counts.length ? counts.reduce((a, b) => a + b, 0) / counts.length : 0;
  if (mean === 0) {
    return { rule: rule.name, counts, mean, variance: null, score: null };
  }
  const variance = counts.reduce((sum, c) => sum + (c - mean) ** 2, 0) / counts.length;
  return { rule: rule.name, counts, mean, variance, score: variance / (mean * mean) };
}

function sameVariance(a: DelimiterScore, b: DelimiterScore): boolean {
  return a.variance !== null && b.variance !== null && Math.abs(a.variance - b.variance) < EPSILON;
}

export interface DelimiterChoice {
  rule: DelimiterRule;
  fallback: boolean;
  scores: DelimiterScore[];
}

export function chooseDelimiter(lines: SourceLine[]): DelimiterChoice {
  const scores = DELIMITER_RULES.map((rule) => scoreRule(rule, lines));

  let best: DelimiterScore | null = null;
  for (const candidate of scores) {
    if (candidate.score === null) continue;
    // Equal variance, or equal relative variance, keeps the earlier rule
    if (best === null || best.score === null) {
      best = candidate;
    } else if (!sameVariance(candidate, best) && candidate.score < best.score - EPSILON) {
      best = candidate;
    }
  }

  if (!best) {
    return { rule: getRule(FALLBACK_RULE), fallback: true, scores };
  }
  return { rule: getRule(best.rule), fallback: false, scores };
}
