import { describe, expect, it } from 'vitest';
import { chooseDelimiter, getRule, scoreRule } from './delimiter-rules';
import { nonEmptyLines } from './tokenizer';

describe('chooseDelimiter', () => {
  it('picks semicolon for a consistent semicolon file', () => {
    const choice = chooseDelimiter(nonEmptyLines('a;b;c\n1;2;3\n4;5;6'));
    expect(choice.rule.name).toBe('semicolon');
    expect(choice.rule.decimalSeparator).toBe(',');
    expect(choice.fallback).toBe(false);
  });

  it('picks comma for a consistent comma file', () => {
    const choice = chooseDelimiter(nonEmptyLines('a,b,c\n1,2,3'));
    expect(choice.rule.name).toBe('comma');
    expect(choice.rule.decimalSeparator).toBe('.');
  });

  it('is not fooled by decimal commas in a semicolon file', () => {
    const choice = chooseDelimiter(nonEmptyLines('Cell;Value\nA;1,5\nB;2,5'));
    expect(choice.rule.name).toBe('semicolon');
    const comma = choice.scores.find((s) => s.rule === 'comma');
    expect(comma?.score).toBeCloseTo(0.5);
  });

  it('keeps the earlier rule on a tie', () => {
    expect(chooseDelimiter(nonEmptyLines('a;b,c\n1;2,3')).rule.name).toBe('semicolon');
  });

  it('prefers semicolon over comma when their variances are equal', () => {
    const choice = chooseDelimiter(nonEmptyLines('a,b,c,d,e;f\n1,2,3,4,5;6\n1,2,3,4,5,6;7;8'));
    const variance = (name: string) => choice.scores.find((s) => s.rule === name)?.variance;

    expect(variance('semicolon')).toBeCloseTo(2 / 9);
    expect(variance('comma')).toBeCloseTo(2 / 9);
    expect(choice.rule.name).toBe('semicolon');
  });

  it('picks tab when only tabs are consistent', () => {
    expect(chooseDelimiter(nonEmptyLines('a\tb\n1\t2')).rule.name).toBe('tab');
  });

  it('falls back to comma when no delimiter occurs', () => {
    const choice = chooseDelimiter(nonEmptyLines('abc\ndef'));
    expect(choice.rule.name).toBe('comma');
    expect(choice.fallback).toBe(true);
    expect(choice.scores.every((s) => s.score === null)).toBe(true);
  });
});

describe('scoreRule', () => {
  it('scores by relative variance of per-line counts', () => {
    const score = scoreRule(getRule('comma'), nonEmptyLines('a,b\na,b,c'));
    expect(score.counts).toEqual([1, 2]);
    expect(score.mean).toBe(1.5);
    expect(score.variance).toBeCloseTo(0.25);
    expect(score.score).toBeCloseTo(1 / 9);
  });
});
