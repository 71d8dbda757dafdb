/**
 * Index resolution: turns an index spec into an ordered list of 0-based
 * target positions.
 *
 * Four spec kinds, exactly one per call:
 * - positive positions (`p > length` is a slot past the end)
 * - negative positions (ascending complement over `1..length`)
 * - boolean mask (recycled up to `length`; true entries past the end are
 *   slots past the end)
 * - names (first match; no match is a missing slot)
 *
 * Reads turn slots past the end into NA. Writes grow the vector to reach
 * them (see `mutate.ts`).
 */

import { InvalidIndexError, MixedSignIndexError } from './errors';
import { NA, type Cell } from './lattice';
import { isVector, length, lookupName, toArray, type AtomicVector } from './store';

export type IndexSpec =
  | number
  | string
  | boolean
  | readonly (number | NA)[]
  | readonly (boolean | NA)[]
  | readonly (string | NA)[]
  | AtomicVector;

export type ResolveMode = 'read' | 'write';

/** Target with no position at all (NA index, unmatched name on read) */
export const MISSING = -1;

export interface Resolution {
  /** 0-based targets in spec order; may hold MISSING or positions past the end */
  positions: number[];
  /** Highest addressed 1-based position, 0 when nothing is addressed */
  highest: number;
  /** Names for slots a name-based write creates past the end */
  grownNames: Map<number, string>;
}

type NormalSpec =
  | { mode: 'positions'; values: (number | NA)[] }
  | { mode: 'mask'; values: (boolean | NA)[] }
  | { mode: 'names'; values: (string | NA)[] };

function classify(values: readonly Cell[]): NormalSpec {
  const present = values.filter((v) => v !== NA);
  if (values.length === 0 || (present.length > 0 && present.every((v) => typeof v === 'number'))) {
    return { mode: 'positions', values: values.map((v) => (typeof v === 'number' ? v : NA)) };
  }
  if (present.every((v) => typeof v === 'boolean')) {
    return { mode: 'mask', values: values.map((v) => (typeof v === 'boolean' ? v : NA)) };
  }
  if (present.every((v) => typeof v === 'string')) {
    return { mode: 'names', values: values.map((v) => (typeof v === 'string' ? v : NA)) };
  }
  throw new InvalidIndexError('index mixes numbers, booleans and names');
}

function normalize(spec: IndexSpec): NormalSpec {
  if (isVector(spec)) {
    const cells = toArray(spec);
    switch (spec.kind) {
      case 'logical':
        return { mode: 'mask', values: cells.map((v) => (typeof v === 'boolean' ? v : NA)) };
      case 'character':
        return { mode: 'names', values: cells.map((v) => (typeof v === 'string' ? v : NA)) };
      default:
        return { mode: 'positions', values: cells.map((v) => (typeof v === 'number' ? v : NA)) };
    }
  }
  if (typeof spec === 'object') return classify(spec);
  return classify([spec]);
}

function rejectMissingOnWrite(mode: ResolveMode): void {
  if (mode === 'write') {
    throw new InvalidIndexError('missing values are not allowed in subscripted assignments');
  }
}

function highestOf(positions: readonly number[]): number {
  let highest = 0;
  for (const p of positions) {
    if (p + 1 > highest) highest = p + 1;
  }
  return highest;
}

function resolvePositions(values: (number | NA)[], n: number, mode: ResolveMode): Resolution {
  const truncated: (number | NA)[] = values.map((v) => {
    if (v === NA || Number.isNaN(v)) return NA;
    if (!Number.isFinite(v)) throw new InvalidIndexError(`infinite index ${v}`);
    return Math.trunc(v);
  });

  const hasNegative = truncated.some((v) => v !== NA && v < 0);
  const hasPositive = truncated.some((v) => v !== NA && v > 0);
  if (hasNegative && hasPositive) throw new MixedSignIndexError();

  if (hasNegative) {
    if (truncated.includes(NA)) {
      throw new InvalidIndexError("can't mix missing values with negative subscripts");
    }
    const excluded = new Set<number>();
    for (const v of truncated) {
      if (v !== NA) excluded.add(-v - 1);
    }
    const positions: number[] = [];
    for (let i = 0; i < n; i++) {
      if (!excluded.has(i)) positions.push(i);
    }
    return { positions, highest: highestOf(positions), grownNames: new Map() };
  }

  const positions: number[] = [];
  for (const v of truncated) {
    if (v === NA) {
      rejectMissingOnWrite(mode);
      positions.push(MISSING);
    } else if (v > 0) {
      positions.push(v - 1);
    }
  }
  return { positions, highest: highestOf(positions), grownNames: new Map() };
}

function resolveMask(values: (boolean | NA)[], n: number, mode: ResolveMode): Resolution {
  const positions: number[] = [];
  const m = values.length;
  if (m > 0) {
    const total = Math.max(m, n);
    for (let i = 0; i < total; i++) {
      const keep = values[i % m];
      if (keep === NA) {
        rejectMissingOnWrite(mode);
        positions.push(MISSING);
      } else if (keep) {
        positions.push(i);
      }
    }
  }
  return { positions, highest: highestOf(positions), grownNames: new Map() };
}

function resolveNames(v: AtomicVector, values: (string | NA)[], mode: ResolveMode): Resolution {
  const positions: number[] = [];
  const grownNames = new Map<number, string>();
  const grownByName = new Map<string, number>();
  let next = length(v);

  for (const name of values) {
    if (name === NA) {
      rejectMissingOnWrite(mode);
      positions.push(MISSING);
      continue;
    }

    const hit = lookupName(v, name);
    if (hit !== undefined) {
      positions.push(hit);
    } else if (mode === 'read') {
      positions.push(MISSING);
    } else {
      let slot = grownByName.get(name);
      if (slot === undefined) {
        slot = next++;
        grownByName.set(name, slot);
        grownNames.set(slot, name);
      }
      positions.push(slot);
    }
  }

  return { positions, highest: highestOf(positions), grownNames };
}

/**
 * @throws MixedSignIndexError positive and negative positions together
 * @throws InvalidIndexError mixed spec types, infinite positions, NA with
 * negative positions, or any NA when writing
 */
export function resolveIndex(v: AtomicVector, spec: IndexSpec, mode: ResolveMode = 'read'): Resolution {
  const normal = normalize(spec);
  switch (normal.mode) {
    case 'positions':
      return resolvePositions(normal.values, length(v), mode);
    case 'mask':
      return resolveMask(normal.values, length(v), mode);
    case 'names':
      return resolveNames(v, normal.values, mode);
  }
}
