/**
 * Recycling: cyclic reuse of shorter operands so elementwise operations
 * see operands of one common length.
 *
 * The policy is returned, never applied silently: callers get the plan
 * and any warning, and decide whether to surface the warning.
 */

import { IncompatibleLengthError, RecycleLengthWarning } from './errors';

export interface Recycled<T> {
  value: T;
  warning?: RecycleLengthWarning;
}

export interface RecyclePlan {
  length: number;
  indexA(i: number): number;
  indexB(i: number): number;
}

export interface MultiRecyclePlan {
  length: number;
  /** Source index into operand `operand` for output position `i` */
  index(operand: number, i: number): number;
}

/**
 * Common length of several operands.
 * @throws IncompatibleLengthError when a zero-length operand meets a non-empty one
 */
export function alignAll(lengths: readonly number[]): Recycled<MultiRecyclePlan> {
  const longest = lengths.length === 0 ? 0 : Math.max(...lengths);
  const plan: MultiRecyclePlan = {
    length: longest,
    index: (operand, i) => i % lengths[operand],
  };
  if (longest === 0) return { value: plan };

  if (lengths.some((n) => n === 0)) {
    throw new IncompatibleLengthError(lengths);
  }

  const misfit = lengths.find((n) => longest % n !== 0);
  return misfit === undefined
    ? { value: plan }
    : { value: plan, warning: new RecycleLengthWarning(longest, misfit) };
}

export function align(lenA: number, lenB: number): Recycled<RecyclePlan> {
  const { value, warning } = alignAll([lenA, lenB]);
  return {
    value: {
      length: value.length,
      indexA: (i) => value.index(0, i),
      indexB: (i) => value.index(1, i),
    },
    warning,
  };
}

/**
 * Recycle a replacement of `sourceLen` values over `targetLen` slots.
 * Extra source values beyond `targetLen` are dropped.
 */
export function recycleTo(sourceLen: number, targetLen: number): Recycled<(i: number) => number> {
  const index = (i: number) => i % sourceLen;
  if (targetLen === 0) return { value: index };
  if (sourceLen === 0) {
    throw new IncompatibleLengthError([sourceLen, targetLen], `replacement has length zero for ${targetLen} targets`);
  }
  return targetLen % sourceLen === 0
    ? { value: index }
    : { value: index, warning: new RecycleLengthWarning(Math.max(targetLen, sourceLen), Math.min(targetLen, sourceLen)) };
}
