import { describe, it, expect, vi } from 'vitest';
import {
  NA,
  assign,
  at,
  combine,
  copyVector,
  extract,
  kindOf,
  length,
  names,
  sequence,
  toArray,
  vectorOf,
  IncompatibleLengthError,
  InvalidArgumentError,
  InvalidIndexError,
  MixedSignIndexError,
  RecycleLengthWarning,
  type AtomicVector,
} from './index';

const nameList = (v: AtomicVector) => {
  const n = names(v);
  return n ? toArray(n) : undefined;
};

describe('assign', () => {
  describe('positions', () => {
    it('should write in place and return the same vector', () => {
      const v = vectorOf('double', [1, 2, 3]);
      const result = assign(v, 2, 20);

      expect(result).toBe(v);
      expect(toArray(v)).toEqual([1, 20, 3]);
    });

    it('should grow past the end, filling with NA', () => {
      const v = vectorOf('double', [1, 2, 3]);
      assign(v, 6, 9);

      expect(toArray(v)).toEqual([1, 2, 3, NA, NA, 9]);
    });

    it('should grow across a wide gap in one write', () => {
      const v = vectorOf('double', [1, 2, 3], ['a', 'b', 'c']);
      assign(v, 5000, 9);

      expect(length(v)).toBe(5000);
      expect(at(v, 3)).toBe(3);
      expect(at(v, 4)).toBe(NA);
      expect(at(v, 4999)).toBe(NA);
      expect(at(v, 5000)).toBe(9);
      expect(nameList(v)?.slice(2, 5)).toEqual(['c', '', '']);
    });

    it('should fill gaps between grown positions', () => {
      const v = vectorOf('double', [1]);
      assign(v, [3, 5], [30, 50]);

      expect(toArray(v)).toEqual([1, NA, 30, NA, 50]);
    });

    it('should let later targets win', () => {
      const v = vectorOf('double', [0, 0]);
      assign(v, [1, 1], [5, 6]);

      expect(toArray(v)).toEqual([6, 0]);
    });

    it('should write everything not excluded', () => {
      const v = vectorOf('double', [1, 2, 3, 4]);
      assign(v, -1, 0);

      expect(toArray(v)).toEqual([1, 0, 0, 0]);
    });

    it('should write through a recycled mask', () => {
      const v = vectorOf('double', [1, 2, 3, 4]);
      assign(v, [true, false], 0);

      expect(toArray(v)).toEqual([0, 2, 0, 4]);
    });
  });

  describe('kinds', () => {
    it('should promote the target to the replacement kind', () => {
      const v = vectorOf('integer', [1, 2]);
      assign(v, 1, 'a');

      expect(kindOf(v)).toBe('character');
      expect(toArray(v)).toEqual(['a', '2']);
    });

    it('should lift the replacement to the target kind', () => {
      const v = vectorOf('double', [1.5, 2.5]);
      assign(v, 2, true);

      expect(kindOf(v)).toBe('double');
      expect(toArray(v)).toEqual([1.5, 1]);
    });

    it('should promote and grow together', () => {
      const v = vectorOf('logical', [true]);
      assign(v, 3, 2.5);

      expect(kindOf(v)).toBe('double');
      expect(toArray(v)).toEqual([1, NA, 2.5]);
    });
  });

  describe('recycling', () => {
    it('should cycle a short replacement', () => {
      const v = sequence(1, 4);
      assign(v, [1, 2, 3, 4], vectorOf('integer', [0, 1]));

      expect(toArray(v)).toEqual([0, 1, 0, 1]);
    });

    it('should warn for a partial cycle and still write', () => {
      const onWarning = vi.fn();
      const v = vectorOf('double', [1, 2, 3]);
      assign(v, [1, 2, 3], [9, 8], { onWarning });

      expect(toArray(v)).toEqual([9, 8, 9]);
      expect(onWarning).toHaveBeenCalledWith(expect.any(RecycleLengthWarning));
    });
  });

  describe('names', () => {
    it('should replace the first matching element', () => {
      const v = vectorOf('double', [1, 2, 3], ['a', 'b', 'a']);
      assign(v, 'a', 10);

      expect(toArray(v)).toEqual([10, 2, 3]);
    });

    it('should append unmatched names', () => {
      const v = vectorOf('double', [1, 2], ['a', 'b']);
      assign(v, ['c', 'd'], [3, 4]);

      expect(toArray(v)).toEqual([1, 2, 3, 4]);
      expect(nameList(v)).toEqual(['a', 'b', 'c', 'd']);
      expect(toArray(extract(v, 'd'))).toEqual([4]);
    });

    it('should give a repeated new name a single slot', () => {
      const v = vectorOf('double', [1], ['a']);
      assign(v, ['z', 'z'], [5, 6]);

      expect(toArray(v)).toEqual([1, 6]);
      expect(nameList(v)).toEqual(['a', 'z']);
    });

    it('should name an unnamed vector when writing by name', () => {
      const v = vectorOf('double', [1]);
      assign(v, 'z', 2);

      expect(nameList(v)).toEqual(['', 'z']);
    });

    it('should pad names when growing by position', () => {
      const v = vectorOf('double', [1], ['a']);
      assign(v, 3, 3);

      expect(nameList(v)).toEqual(['a', '', '']);
    });
  });

  describe('failures', () => {
    it('should leave the target untouched on an invalid index', () => {
      const v = vectorOf('double', [1, 2]);

      expect(() => assign(v, [1, -2], 0)).toThrow(MixedSignIndexError);
      expect(() => assign(v, [1, NA], 0)).toThrow(InvalidIndexError);
      expect(() => assign(v, ['a', NA], 0)).toThrow(InvalidIndexError);
      expect(toArray(v)).toEqual([1, 2]);
      expect(kindOf(v)).toBe('double');
    });

    it('should refuse to grow past the longest vector', () => {
      const v = vectorOf('double', [1, 2, 3]);

      expect(() => assign(v, [1, 1e12], 0)).toThrow(InvalidArgumentError);
      expect(() => assign(v, 2 ** 31, 0)).toThrow('cannot grow a vector to length 2147483648');
      expect(toArray(v)).toEqual([1, 2, 3]);
    });

    it('should refuse an empty replacement', () => {
      const v = vectorOf('double', [1, 2]);

      expect(() => assign(v, 1, combine())).toThrow(IncompatibleLengthError);
      expect(toArray(v)).toEqual([1, 2]);
    });

    it('should do nothing for an empty index', () => {
      const v = vectorOf('double', [1, 2]);
      assign(v, 0, 'x');
      assign(v, [], combine());

      expect(toArray(v)).toEqual([1, 2]);
      expect(kindOf(v)).toBe('double');
    });
  });
});

describe('copyVector', () => {
  it('should not see writes made to the original', () => {
    const v = sequence(1, 100);
    const copy = copyVector(v);
    assign(v, [1, 50, 100], 0);

    expect(toArray(copy)).toEqual(toArray(sequence(1, 100)));
    expect(toArray(extract(v, [1, 50, 100]))).toEqual([0, 0, 0]);
  });

  it('should not leak writes back to the original', () => {
    const v = vectorOf('double', [1, 2], ['a', 'b']);
    const copy = copyVector(v);
    assign(copy, 'c', 3);

    expect(toArray(v)).toEqual([1, 2]);
    expect(nameList(v)).toEqual(['a', 'b']);
    expect(nameList(copy)).toEqual(['a', 'b', 'c']);
  });
});
