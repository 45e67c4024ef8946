import { describe, expect, it } from 'vitest';
import { getRule } from '../sniffer/delimiter-rules';
import { isNumeric, parseNumber } from './numeric';

const semicolon = getRule('semicolon');
const comma = getRule('comma');

describe('parseNumber', () => {
  it('reads comma decimals with dot thousands under the semicolon rule', () => {
    expect(parseNumber('1.234,56', semicolon)).toEqual({ value: 1234.56, integer: false });
    expect(parseNumber('1234,5', semicolon)).toEqual({ value: 1234.5, integer: false });
  });

  it('reads dot decimals with comma thousands under the comma rule', () => {
    expect(parseNumber('1,234.56', comma)).toEqual({ value: 1234.56, integer: false });
  });

  it('flags integers', () => {
    expect(parseNumber('42', comma)).toEqual({ value: 42, integer: true });
    expect(parseNumber('-7', semicolon)).toEqual({ value: -7, integer: true });
  });

  it('accepts exponents and surrounding blanks', () => {
    expect(parseNumber(' 3.5e2 ', comma)).toEqual({ value: 350, integer: false });
  });

  it('rejects thousands separators outside 3-digit groups', () => {
    expect(parseNumber('12.5', semicolon)).toBeNull();
    expect(parseNumber('1,5', comma)).toBeNull();
  });

  it('rejects non-numbers', () => {
    expect(parseNumber('abc', comma)).toBeNull();
    expect(parseNumber('', comma)).toBeNull();
    expect(isNumeric('12a', comma)).toBe(false);
  });
});
