/**
 * Atomic vectors: construction, length and names
 *
 * A vector owns a persistent bit-trie of cells and, when named, a parallel
 * trie of names. Every mutating call edits under a fresh owner, so vectors
 * that share trie nodes never observe each other's writes.
 */

import {
  VECTOR,
  MAX_LENGTH,
  vecFromArray,
  vecGet,
  vecIter,
  vecToArray,
  hamtEmpty,
  hamtGet,
  hamtSet,
  type HMap,
  type Owner,
  type Vec,
} from './internal';
import { InvalidArgumentError, InvalidStepError } from './errors';
import {
  NA,
  checkCell,
  coerce,
  isWholeInt,
  kindOfScalar,
  maxKind,
  type Cell,
  type CellOf,
  type ElementKind,
} from './lattice';

export interface AtomicVector {
  readonly [VECTOR]: true;
  kind: ElementKind;
  data: Vec<Cell>;
  /** Same length as `data` when present; unnamed elements hold "" */
  names: Vec<string> | undefined;
  /** name → ascending 0-based positions, built on first lookup */
  nameIndex: HMap<number[]> | undefined;
}

/** Anything accepted where a vector operand is read. */
export type VectorLike = AtomicVector | Cell | readonly Cell[];

export function createVector(
  kind: ElementKind,
  data: Vec<Cell>,
  names?: Vec<string>
): AtomicVector {
  return { [VECTOR]: true, kind, data, names, nameIndex: undefined };
}

export function isVector(value: unknown): value is AtomicVector {
  return typeof value === 'object' && value !== null && VECTOR in value;
}

/**
 * Typed constructor.
 * @throws InvalidArgumentError when a cell does not belong to `kind`, or
 * when there are more names than cells
 */
export function vectorOf<K extends ElementKind>(
  kind: K,
  cells: readonly CellOf<K>[],
  names?: readonly string[]
): AtomicVector {
  cells.forEach((cell, i) => {
    if (!checkCell(kind, cell)) {
      throw new InvalidArgumentError(`element ${i + 1} (${String(cell)}) is not a valid ${kind} value`);
    }
  });
  const vector = createVector(kind, vecFromArray<Cell>(cells));
  return names === undefined ? vector : setNames(vector, names);
}

/** Length-1 vector of `kind` holding its missing value. */
export function naOf(kind: ElementKind): AtomicVector {
  return createVector(kind, vecFromArray<Cell>([NA]));
}

// =====================================================
// combine
// =====================================================

interface Part {
  kind: ElementKind;
  cells: Cell[];
  names?: string[];
}

function partOf(value: VectorLike): Part {
  if (isVector(value)) {
    return {
      kind: value.kind,
      cells: vecToArray(value.data),
      names: value.names ? vecToArray(value.names) : undefined,
    };
  }
  if (typeof value === 'object') {
    return { kind: maxKind(...value.map(kindOfScalar)), cells: [...value] };
  }
  return { kind: kindOfScalar(value), cells: [value] };
}

/**
 * Concatenate vectors and scalars into one vector of the highest kind
 * among them. `combine()` is an empty logical vector.
 */
export function combine(...values: VectorLike[]): AtomicVector {
  const parts = values.map(partOf);
  const kind = maxKind(...parts.map((p) => p.kind));

  const cells: Cell[] = [];
  for (const part of parts) {
    for (const cell of part.cells) {
      cells.push(coerce(cell, part.kind, kind));
    }
  }

  if (!parts.some((p) => p.names)) {
    return createVector(kind, vecFromArray(cells));
  }

  const allNames: string[] = [];
  for (const part of parts) {
    for (let i = 0; i < part.cells.length; i++) {
      allNames.push(part.names ? part.names[i] : '');
    }
  }
  return createVector(kind, vecFromArray(cells), vecFromArray(allNames));
}

/** The vector itself, or a new vector built from scalars. */
export function asVector(value: VectorLike): AtomicVector {
  return isVector(value) ? value : combine(value);
}

// =====================================================
// sequence / repeat
// =====================================================

/**
 * `from, from + step, ...` up to and including `to` where it lands on it.
 * No element passes `to`.
 * Integer when `from` and `step` are whole and every element fits 32 bits.
 */
export function sequence(from: number, to: number, step?: number): AtomicVector {
  if (!Number.isFinite(from) || !Number.isFinite(to) || (step !== undefined && !Number.isFinite(step))) {
    throw new InvalidArgumentError('sequence bounds and step must be finite numbers');
  }

  const by = step ?? (to >= from ? 1 : -1);
  let n: number;
  if (by === 0) {
    if (from !== to) {
      throw new InvalidStepError(`step is zero but from (${from}) differs from to (${to})`, from, to, by);
    }
    n = 1;
  } else {
    const span = (to - from) / by;
    if (span < 0) {
      throw new InvalidStepError(`wrong sign in step (${by}) for ${from} to ${to}`, from, to, by);
    }
    n = Math.floor(span + 1e-10) + 1;
  }

  if (n > MAX_LENGTH) {
    throw new InvalidArgumentError(`sequence of length ${n} is too long`);
  }

  // Accumulated steps may overshoot `to` by rounding
  const cells: number[] = new Array(n);
  for (let i = 0; i < n; i++) {
    const x = from + i * by;
    cells[i] = by > 0 ? Math.min(x, to) : Math.max(x, to);
  }

  const last = cells[n - 1];
  const kind: ElementKind =
    Number.isInteger(by) && isWholeInt(from) && isWholeInt(last) ? 'integer' : 'double';

  return createVector(kind, vecFromArray<Cell>(cells));
}

export interface RepeatOptions {
  /** Repeat every element this many times before cycling */
  each?: number;
}

function checkCount(name: string, n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative whole number, got ${n}`);
  }
}

/** Cycle the whole of `value` `times` times. */
export function repeat(value: VectorLike, times: number, options: RepeatOptions = {}): AtomicVector {
  const each = options.each ?? 1;
  checkCount('times', times);
  checkCount('each', each);

  const source = asVector(value);
  const cells = vecToArray(source.data);
  const sourceNames = source.names ? vecToArray(source.names) : undefined;

  const total = cells.length * each * times;
  if (total > MAX_LENGTH) {
    throw new InvalidArgumentError(`repeat of length ${total} is too long`);
  }

  const cycleCells: Cell[] = [];
  const cycleNames: string[] = [];
  cells.forEach((cell, i) => {
    for (let k = 0; k < each; k++) {
      cycleCells.push(cell);
      if (sourceNames) cycleNames.push(sourceNames[i]);
    }
  });

  const outCells: Cell[] = [];
  const outNames: string[] = [];
  for (let t = 0; t < times; t++) {
    for (let i = 0; i < cycleCells.length; i++) {
      outCells.push(cycleCells[i]);
      if (sourceNames) outNames.push(cycleNames[i]);
    }
  }

  return createVector(
    source.kind,
    vecFromArray(outCells),
    sourceNames ? vecFromArray(outNames) : undefined
  );
}

// =====================================================
// Reading
// =====================================================

export function length(v: AtomicVector): number {
  return v.data.count;
}

export function kindOf(v: AtomicVector): ElementKind {
  return v.kind;
}

export function toArray(v: AtomicVector): Cell[] {
  return vecToArray(v.data);
}

/** Element at 1-based `position`; NA outside `1..length`. */
export function at(v: AtomicVector, position: number): Cell {
  return vecGet(v.data, position - 1) ?? NA;
}

// =====================================================
// Names
// =====================================================

export function names(v: AtomicVector): AtomicVector | undefined {
  return v.names ? createVector('character', v.names) : undefined;
}

/**
 * Copy of `v` carrying `newNames`. Missing names become "", a short list is
 * padded with "", and `undefined` drops the names.
 */
export function setNames(
  v: AtomicVector,
  newNames: readonly (string | NA)[] | AtomicVector | undefined
): AtomicVector {
  if (newNames === undefined) {
    return createVector(v.kind, v.data);
  }

  let given: Cell[];
  if (isVector(newNames)) {
    const from = newNames.kind;
    given = vecToArray(newNames.data).map((cell) => coerce(cell, from, 'character'));
  } else {
    given = [...newNames];
  }

  const n = length(v);
  if (given.length > n) {
    throw new InvalidArgumentError(`${given.length} names given for a vector of length ${n}`);
  }

  const out: string[] = [];
  for (let i = 0; i < n; i++) {
    const name = given[i];
    out.push(typeof name === 'string' ? name : '');
  }
  return createVector(v.kind, v.data, vecFromArray(out));
}

export function nameIndex(v: AtomicVector): HMap<number[]> {
  if (v.nameIndex) return v.nameIndex;

  let index = hamtEmpty<number[]>();
  if (v.names) {
    const owner: Owner = {};
    let i = 0;
    for (const name of vecIter(v.names)) {
      if (name !== '') {
        const hits = hamtGet(index, name);
        if (hits) hits.push(i);
        else index = hamtSet(index, owner, name, [i]);
      }
      i++;
    }
  }

  v.nameIndex = index;
  return index;
}

/** First 0-based position carrying `name`; "" never matches. */
export function lookupName(v: AtomicVector, name: string): number | undefined {
  if (name === '') return undefined;
  return hamtGet(nameIndex(v), name)?.[0];
}
