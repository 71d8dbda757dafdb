import { describe, it, expect } from 'vitest';
import {
  NA,
  MISSING,
  binaryOp,
  extract,
  kindOf,
  length,
  names,
  resolveIndex,
  sequence,
  toArray,
  vectorOf,
  InvalidIndexError,
  MixedSignIndexError,
} from './index';

const x = vectorOf('double', [10, 20, 30, 40]);
const named = vectorOf('double', [1, 2, 3], ['a', 'b', 'a']);

describe('extract', () => {
  describe('positive positions', () => {
    it('should read positions in index order, repeats included', () => {
      expect(toArray(extract(x, [2, 4]))).toEqual([20, 40]);
      expect(toArray(extract(x, [4, 1, 1]))).toEqual([40, 10, 10]);
    });

    it('should drop zeros', () => {
      expect(length(extract(x, 0))).toBe(0);
      expect(toArray(extract(x, [0, 2]))).toEqual([20]);
    });

    it('should truncate fractional positions', () => {
      expect(toArray(extract(x, 1.9))).toEqual([10]);
    });

    it('should read NA past the end and for NA positions', () => {
      expect(toArray(extract(x, 6))).toEqual([NA]);
      expect(toArray(extract(x, [NA, 1]))).toEqual([NA, 10]);
    });

    it('should keep the kind of the source', () => {
      const empty = extract(x, []);

      expect(length(empty)).toBe(0);
      expect(kindOf(empty)).toBe('double');
      expect(toArray(extract(vectorOf('character', ['p', 'q']), 2))).toEqual(['q']);
    });

    it('should reject infinite positions', () => {
      expect(() => extract(x, Infinity)).toThrow(InvalidIndexError);
    });
  });

  describe('negative positions', () => {
    it('should keep everything not excluded, in ascending order', () => {
      expect(toArray(extract(x, [-3, -1]))).toEqual([20, 40]);
    });

    it('should ignore exclusions past the end', () => {
      expect(toArray(extract(x, -5))).toEqual([10, 20, 30, 40]);
    });

    it('should reject mixed signs', () => {
      expect(() => extract(x, [1, -1])).toThrow(MixedSignIndexError);
      expect(() => extract(x, [1, -1])).toThrow("can't mix positive and negative subscripts");
    });

    it('should reject NA among exclusions', () => {
      expect(() => extract(x, [-1, NA])).toThrow(InvalidIndexError);
    });

    it('should allow zeros among exclusions', () => {
      expect(toArray(extract(x, [0, -2]))).toEqual([10, 30, 40]);
    });
  });

  describe('masks', () => {
    it('should recycle a short mask', () => {
      expect(toArray(extract(x, [true, false]))).toEqual([10, 30]);
    });

    it('should read NA where the mask is NA', () => {
      expect(toArray(extract(x, [true, NA, false, true]))).toEqual([10, NA, 40]);
      expect(toArray(extract(x, [NA]))).toEqual([NA, NA, NA, NA]);
    });

    it('should read NA for true entries past the end', () => {
      expect(toArray(extract(x, [false, false, false, false, true]))).toEqual([NA]);
    });

    it('should filter by a comparison result', () => {
      expect(toArray(extract(x, binaryOp('>', x, 25)))).toEqual([30, 40]);
    });
  });

  describe('names', () => {
    it('should take the first match and carry its name', () => {
      const v = extract(named, 'a');

      expect(toArray(v)).toEqual([1]);
      expect(toArray(names(v) ?? x)).toEqual(['a']);
    });

    it('should read NA with an empty name for no match', () => {
      const v = extract(named, ['b', 'c', NA]);

      expect(toArray(v)).toEqual([2, NA, NA]);
      expect(toArray(names(v) ?? x)).toEqual(['b', '', '']);
    });

    it('should never match on an unnamed vector', () => {
      const v = extract(x, 'a');

      expect(toArray(v)).toEqual([NA]);
      expect(names(v)).toBeUndefined();
    });
  });

  it('should accept an integer vector as positions', () => {
    expect(toArray(extract(x, sequence(2, 3)))).toEqual([20, 30]);
  });

  it('should leave the source untouched', () => {
    extract(x, [1, 2]);

    expect(toArray(x)).toEqual([10, 20, 30, 40]);
  });
});

describe('resolveIndex', () => {
  it('should report the highest addressed position', () => {
    const r = resolveIndex(x, [2, 6], 'write');

    expect(r.positions).toEqual([1, 5]);
    expect(r.highest).toBe(6);
  });

  it('should mark missing targets on read', () => {
    expect(resolveIndex(named, ['z']).positions).toEqual([MISSING]);
  });

  it('should give each new name one fresh slot on write', () => {
    const r = resolveIndex(named, ['z', 'z', 'a'], 'write');

    expect(r.positions).toEqual([3, 3, 0]);
    expect(r.highest).toBe(4);
    expect([...r.grownNames]).toEqual([[3, 'z']]);
  });

  it('should refuse NA on write', () => {
    expect(() => resolveIndex(x, [1, NA], 'write')).toThrow(InvalidIndexError);
    expect(() => resolveIndex(x, [true, NA], 'write')).toThrow(
      'missing values are not allowed in subscripted assignments'
    );
  });
});
