// ──────────────────────────────────────────
// Ingestion: locale-aware numeric coercion
// ──────────────────────────────────────────

import { DelimiterRule } from '../../../shared/types';

export interface ParsedNumber {
  value: number;
  integer: boolean;
}

const patternCache = new Map<string, RegExp>();

function escape(ch: string): string {
  return ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function numberPattern(rule: DelimiterRule): RegExp {
  const key = `${rule.thousandsSeparator}|${rule.decimalSeparator}`;
  let pattern = patternCache.get(key);
  if (!pattern) {
    const t = escape(rule.thousandsSeparator);
    const d = escape(rule.decimalSeparator);
    pattern = new RegExp(`^([+-]?)(\\d{1,3}(?:${t}\\d{3})+|\\d+)(?:${d}(\\d+))?(?:[eE]([+-]?\\d+))?$`);
    patternCache.set(key, pattern);
  }
  return pattern;
}

/**
 * Thousands separators are only accepted in groups of three digits, so `12.5`
 * under a comma-decimal rule is rejected rather than read as 125.
 */
export function parseNumber(token: string, rule: DelimiterRule): ParsedNumber | null {
  const match = numberPattern(rule).exec(token.trim());
  if (!match) return null;

  const [, sign, whole, fraction, exponent] = match;
  const digits = whole.split(rule.thousandsSeparator).join('');
  let canonical = `${sign}${digits}`;
  if (fraction !== undefined) canonical += `.${fraction}`;
  if (exponent !== undefined) canonical += `e${exponent}`;

  const value = Number(canonical);
  if (!Number.isFinite(value)) return null;
  return { value, integer: fraction === undefined && exponent === undefined };
}

export function isNumeric(token: string, rule: DelimiterRule): boolean {
  return parseNumber(token, rule) !== null;
}
