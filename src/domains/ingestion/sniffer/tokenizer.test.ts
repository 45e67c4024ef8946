import { describe, expect, it } from 'vitest';
import { countDelimiters, nonEmptyLines, parseRecords } from './tokenizer';

describe('parseRecords', () => {
  it('keeps delimiters inside quotes', () => {
    expect(parseRecords('a;"b;c";d', ';').records).toEqual([{ line: 0, tokens: ['a', 'b;c', 'd'] }]);
  });

  it('collapses doubled quotes', () => {
    expect(parseRecords('"say ""hi""",x', ',').records[0].tokens).toEqual(['say "hi"', 'x']);
  });

  it('does not trim tokens', () => {
    expect(parseRecords(' a , b ', ',').records[0].tokens).toEqual([' a ', ' b ']);
  });

  it('keeps trailing empty tokens', () => {
    expect(parseRecords('a;b;', ';').records[0].tokens).toEqual(['a', 'b', '']);
  });

  it('skips blank lines and numbers records by their first physical line', () => {
    const { records, issues } = parseRecords('a,b\r\n\r\n"x\r\ny",1\n  \nz,2\n', ',');

    expect(records).toEqual([
      { line: 0, tokens: ['a', 'b'] },
      { line: 2, tokens: ['x\ny', '1'] },
      { line: 5, tokens: ['z', '2'] },
    ]);
    expect(issues).toEqual([]);
  });

  it('reports an unterminated quote', () => {
    const { issues } = parseRecords('a;b\n"open;1\n', ';');

    expect(issues).toEqual([
      { code: 'RowShapeError', message: 'Malformed quoting: Quoted field unterminated', fatal: false, line: 2 },
    ]);
  });
});

describe('countDelimiters', () => {
  it('ignores quoted delimiters', () => {
    expect(countDelimiters('a,"b,c",d', ',')).toBe(2);
  });
});

describe('nonEmptyLines', () => {
  it('splits on every line ending and keeps 0-based positions', () => {
    expect(nonEmptyLines('a\r\n\r\n  \nb\rc')).toEqual([
      { line: 0, text: 'a' },
      { line: 3, text: 'b' },
      { line: 4, text: 'c' },
    ]);
  });
});
