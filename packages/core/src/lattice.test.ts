import { describe, it, expect } from 'vitest';
import {
  KINDS,
  NA,
  castCell,
  checkCell,
  coerce,
  formatNumber,
  kindOfScalar,
  maxKind,
  parseNumeral,
  rankOf,
} from './lattice';
import { CoercionDirectionError } from './errors';

describe('kind order', () => {
  it('should rank logical < integer < double < character', () => {
    expect(KINDS.map(rankOf)).toEqual([0, 1, 2, 3]);
    expect(KINDS).toEqual(['logical', 'integer', 'double', 'character']);
  });

  it('should pick the highest kind', () => {
    expect(maxKind('integer', 'logical')).toBe('integer');
    expect(maxKind('double', 'character', 'integer')).toBe('character');
    expect(maxKind()).toBe('logical');
  });

  it('should give bare scalars their natural kind', () => {
    expect(kindOfScalar(true)).toBe('logical');
    expect(kindOfScalar(1)).toBe('double');
    expect(kindOfScalar('a')).toBe('character');
    expect(kindOfScalar(NA)).toBe('logical');
  });
});

describe('checkCell', () => {
  it('should accept NA for every kind', () => {
    expect(checkCell('logical', NA)).toBe(true);
    expect(checkCell('character', NA)).toBe(true);
  });

  it('should only accept 32-bit whole numbers as integers', () => {
    expect(checkCell('integer', 7)).toBe(true);
    expect(checkCell('integer', 1.5)).toBe(false);
    expect(checkCell('integer', 2 ** 31)).toBe(false);
    expect(checkCell('double', NaN)).toBe(true);
    expect(checkCell('logical', 1)).toBe(false);
  });
});

describe('formatNumber', () => {
  it('should render numbers without locale', () => {
    expect(formatNumber(1)).toBe('1');
    expect(formatNumber(123456.789)).toBe('123456.789');
    expect(formatNumber(-2.5)).toBe('-2.5');
  });

  it('should keep 15 significant digits', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(1 / 3)).toBe('0.333333333333333');
  });

  it('should use two-digit exponents', () => {
    expect(formatNumber(1e21)).toBe('1e+21');
    expect(formatNumber(1e-7)).toBe('1e-07');
  });

  it('should spell special values', () => {
    expect(formatNumber(-0)).toBe('0');
    expect(formatNumber(NaN)).toBe('NaN');
    expect(formatNumber(Infinity)).toBe('Inf');
    expect(formatNumber(-Infinity)).toBe('-Inf');
  });
});

describe('coerce', () => {
  it('should map logical up to numbers', () => {
    expect(coerce(true, 'logical', 'integer')).toBe(1);
    expect(coerce(false, 'logical', 'double')).toBe(0);
    expect(coerce(5, 'integer', 'double')).toBe(5);
  });

  it('should render anything as character', () => {
    expect(coerce(true, 'logical', 'character')).toBe('TRUE');
    expect(coerce(false, 'logical', 'character')).toBe('FALSE');
    expect(coerce(2.5, 'double', 'character')).toBe('2.5');
    expect(coerce(42, 'integer', 'character')).toBe('42');
  });

  it('should keep NA missing', () => {
    expect(coerce(NA, 'integer', 'character')).toBe(NA);
  });

  it('should refuse to move down the lattice', () => {
    expect(() => coerce('1', 'character', 'double')).toThrow(CoercionDirectionError);
    expect(() => coerce(1.5, 'double', 'integer')).toThrow(/cannot implicitly coerce double down to integer/);
  });
});

describe('castCell', () => {
  it('should parse numerals from text', () => {
    expect(castCell('12', 'character', 'integer')).toEqual({ value: 12, lossy: false });
    expect(castCell(' 7 ', 'character', 'double')).toEqual({ value: 7, lossy: false });
    expect(castCell('0x1A', 'character', 'integer')).toEqual({ value: 26, lossy: false });
    expect(castCell('-Inf', 'character', 'double')).toEqual({ value: -Infinity, lossy: false });
  });

  it('should report text that is not a number as lossy', () => {
    expect(castCell('abc', 'character', 'double')).toEqual({ value: NA, lossy: true });
    expect(castCell('NA', 'character', 'double')).toEqual({ value: NA, lossy: false });
  });

  it('should truncate doubles to integers', () => {
    expect(castCell(3.9, 'double', 'integer')).toEqual({ value: 3, lossy: false });
    expect(castCell(-3.9, 'double', 'integer')).toEqual({ value: -3, lossy: false });
    expect(castCell(3e10, 'double', 'integer')).toEqual({ value: NA, lossy: true });
    expect(castCell(NaN, 'double', 'integer')).toEqual({ value: NA, lossy: false });
  });

  it('should read logical words and numbers as logical', () => {
    expect(castCell('T', 'character', 'logical').value).toBe(true);
    expect(castCell('false', 'character', 'logical').value).toBe(false);
    expect(castCell('yes', 'character', 'logical')).toEqual({ value: NA, lossy: false });
    expect(castCell(0, 'double', 'logical').value).toBe(false);
    expect(castCell(-2, 'integer', 'logical').value).toBe(true);
    expect(castCell(NaN, 'double', 'logical').value).toBe(NA);
  });

  it('should fall back to coerce going up', () => {
    expect(castCell(true, 'logical', 'character')).toEqual({ value: 'TRUE', lossy: false });
  });
});

describe('parseNumeral', () => {
  it('should accept decimal and exponent forms', () => {
    expect(parseNumeral('1.5e3')).toBe(1500);
    expect(parseNumeral('.5')).toBe(0.5);
    expect(parseNumeral('-0x10')).toBe(-16);
    expect(parseNumeral('1,5')).toBe(NA);
  });
});
