import { describe, expect, it } from 'vitest';
import { hsPrefixMatchLength, longestHsPrefixMatch, normalizeHsCode } from './hs-code.js';

describe('normalizeHsCode', () => {
  it('strips dots and whitespace', () => {
    expect(normalizeHsCode('7208.10.00.00')).toBe('7208100000');
    expect(normalizeHsCode(' 8703 ')).toBe('8703');
  });
});

describe('hsPrefixMatchLength', () => {
  it('returns the digit length of a matching prefix regardless of dots', () => {
    expect(hsPrefixMatchLength('7208.10.00.00', '7208.10')).toBe(6);
    expect(hsPrefixMatchLength('7208100000', '72')).toBe(2);
  });

  it('returns -1 when the prefix does not match', () => {
    expect(hsPrefixMatchLength('7208100000', '73')).toBe(-1);
    expect(hsPrefixMatchLength('7208', '720810')).toBe(-1);
    expect(hsPrefixMatchLength('7208', '')).toBe(-1);
  });
});

describe('longestHsPrefixMatch', () => {
  it('picks the most specific prefix', () => {
    expect(longestHsPrefixMatch('7208100000', ['72', '7208.10', '7301'])).toBe(6);
    expect(longestHsPrefixMatch('7208100000', ['7301'])).toBe(-1);
  });
});
