/**
 * Elementwise operations
 *
 * Every operation here reads its operands, recycles them to a common
 * length and builds a new vector. Output positions do not depend on each
 * other.
 */

import { vecFromArray, type Vec } from './internal';
import { IntegerOverflowWarning, CoercionWarning, InvalidArgumentError, NonNumericArgumentError, type VectorWarning } from './errors';
import {
  NA,
  castCell,
  checkCell,
  coerce,
  isWholeInt,
  maxKind,
  type Cell,
  type CellOf,
  type ElementKind,
} from './lattice';
import { reportWarnings, type EngineOptions } from './options';
import { align, alignAll } from './recycle';
import { asVector, createVector, length, toArray, type AtomicVector, type VectorLike } from './store';

export type ArithmeticOp = '+' | '-' | '*' | '/' | '^' | '%%' | '%/%';
export type ComparisonOp = '<' | '<=' | '>' | '>=' | '==' | '!=';
export type LogicalOp = '&' | '|';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

const ARITHMETIC_OPS: readonly string[] = ['+', '-', '*', '/', '^', '%%', '%/%'];
const COMPARISON_OPS: readonly string[] = ['<', '<=', '>', '>=', '==', '!='];

function isArithmetic(op: BinaryOp): op is ArithmeticOp {
  return ARITHMETIC_OPS.includes(op);
}

function isComparison(op: BinaryOp): op is ComparisonOp {
  return COMPARISON_OPS.includes(op);
}

/** Names of the first operand whose length matches the result. */
function resultNames(operands: readonly AtomicVector[], resultLength: number): Vec<string> | undefined {
  return operands.find((v) => v.names && length(v) === resultLength)?.names;
}

/** Counts integer results that fell outside 32 bits. */
class OverflowTally {
  count = 0;

  check(result: number): CellOf<'integer'> {
    if (isWholeInt(result)) return result === 0 ? 0 : result;
    this.count++;
    return NA;
  }

  warning(): VectorWarning | undefined {
    return this.count > 0 ? new IntegerOverflowWarning(this.count) : undefined;
  }
}

// =====================================================
// Arithmetic
// =====================================================

function floorMod(x: number, y: number): number {
  if (y === 0) return NaN;
  return x - Math.floor(x / y) * y;
}

function arithmetic(op: ArithmeticOp, x: number, y: number): number {
  switch (op) {
    case '+':
      return x + y;
    case '-':
      return x - y;
    case '*':
      return x * y;
    case '/':
      return x / y;
    case '^':
      return x ** y;
    case '%%':
      return floorMod(x, y);
    case '%/%':
      return Math.floor(x / y);
  }
}

function arithmeticCell(
  op: ArithmeticOp,
  kind: ElementKind,
  x: Cell,
  y: Cell,
  overflow: OverflowTally
): Cell {
  if (op === '^' && (y === 0 || x === 1)) return 1;
  if (typeof x !== 'number' || typeof y !== 'number') return NA;

  if (kind === 'integer') {
    if ((op === '%%' || op === '%/%') && y === 0) return NA;
    return overflow.check(arithmetic(op, x, y));
  }
  return arithmetic(op, x, y);
}

// =====================================================
// Comparison
// =====================================================

function compareCells(x: Cell, y: Cell): number | NA {
  if (x === NA || y === NA) return NA;
  if (typeof x === 'string' && typeof y === 'string') {
    return x < y ? -1 : x > y ? 1 : 0;
  }
  const a = Number(x);
  const b = Number(y);
  if (Number.isNaN(a) || Number.isNaN(b)) return NA;
  return a < b ? -1 : a > b ? 1 : 0;
}

function comparisonCell(op: ComparisonOp, x: Cell, y: Cell): Cell {
  const c = compareCells(x, y);
  if (c === NA) return NA;
  switch (op) {
    case '<':
      return c < 0;
    case '<=':
      return c <= 0;
    case '>':
      return c > 0;
    case '>=':
      return c >= 0;
    case '==':
      return c === 0;
    case '!=':
      return c !== 0;
  }
}

// =====================================================
// Logical (three-valued)
// =====================================================

function logicalCell(op: LogicalOp, x: Cell, y: Cell): Cell {
  if (op === '&') {
    if (x === false || y === false) return false;
    return x === NA || y === NA ? NA : true;
  }
  if (x === true || y === true) return true;
  return x === NA || y === NA ? NA : false;
}

function requireNonCharacter(v: AtomicVector, operation: string): void {
  if (v.kind === 'character') throw new NonNumericArgumentError(operation);
}

/**
 * Apply `op` pairwise over `a` and `b`, recycling the shorter operand.
 *
 * Arithmetic gives the higher operand kind, with two departures from that
 * rule: logical operands count as integer, so `TRUE + TRUE` is integer, and
 * `/` and `^` always give double, even for two integers.
 * Comparison and `&`/`|` give logical. NA in either
 * operand gives NA, except `x ^ 0`, `1 ^ y`, `FALSE & NA` and `TRUE | NA`.
 *
 * @throws NonNumericArgumentError character operand to arithmetic or `&`/`|`
 * @throws IncompatibleLengthError one operand empty, the other not
 */
export function binaryOp(op: BinaryOp, a: VectorLike, b: VectorLike, options?: EngineOptions): AtomicVector {
  const left = asVector(a);
  const right = asVector(b);

  let kind: ElementKind;
  let operandKind: ElementKind;
  if (isArithmetic(op)) {
    requireNonCharacter(left, `binary operator ${op}`);
    requireNonCharacter(right, `binary operator ${op}`);
    kind = op === '/' || op === '^' ? 'double' : maxKind(left.kind, right.kind, 'integer');
    operandKind = kind;
  } else if (isComparison(op)) {
    kind = 'logical';
    operandKind = maxKind(left.kind, right.kind);
  } else {
    requireNonCharacter(left, `logical operator ${op}`);
    requireNonCharacter(right, `logical operator ${op}`);
    kind = 'logical';
    operandKind = 'logical';
  }

  const { value: plan, warning } = align(length(left), length(right));
  const xs = toArray(left).map((cell) => castCell(cell, left.kind, operandKind).value);
  const ys = toArray(right).map((cell) => castCell(cell, right.kind, operandKind).value);

  const overflow = new OverflowTally();
  const out: Cell[] = new Array(plan.length);
  for (let i = 0; i < plan.length; i++) {
    const x = xs[plan.indexA(i)];
    const y = ys[plan.indexB(i)];
    if (isArithmetic(op)) out[i] = arithmeticCell(op, kind, x, y, overflow);
    else if (isComparison(op)) out[i] = comparisonCell(op, x, y);
    else out[i] = logicalCell(op, x, y);
  }

  reportWarnings([warning, overflow.warning()], options);
  return createVector(kind, vecFromArray(out), resultNames([left, right], plan.length));
}

// =====================================================
// Function application
// =====================================================

/** A total function over elements, with the kind of what it returns. */
export interface ElementFunction<K extends ElementKind = ElementKind> {
  kind: K;
  compute: (...args: Cell[]) => CellOf<K>;
  /** NA in any argument gives NA without calling `compute` (default true) */
  propagateNA?: boolean;
}

/**
 * Apply `fn` to every recycled tuple of elements of `vectors`. The operands
 * come as one array, `elementwiseApply(fn, [v1, v2, v3])`, so that options
 * can follow them.
 * @throws InvalidArgumentError no vectors, or `fn` returned a value of
 * another kind
 */
export function elementwiseApply<K extends ElementKind>(
  fn: ElementFunction<K>,
  vectors: readonly VectorLike[],
  options?: EngineOptions
): AtomicVector {
  if (vectors.length === 0) {
    throw new InvalidArgumentError('elementwiseApply needs at least one vector');
  }

  const operands = vectors.map(asVector);
  const columns = operands.map(toArray);
  const { value: plan, warning } = alignAll(operands.map(length));
  const propagateNA = fn.propagateNA ?? true;

  const out: Cell[] = new Array(plan.length);
  for (let i = 0; i < plan.length; i++) {
    const args = columns.map((column, k) => column[plan.index(k, i)]);
    if (propagateNA && args.includes(NA)) {
      out[i] = NA;
      continue;
    }
    const result = fn.compute(...args);
    if (!checkCell(fn.kind, result)) {
      throw new InvalidArgumentError(`function returned ${String(result)} for a ${fn.kind} result`);
    }
    out[i] = result;
  }

  reportWarnings([warning], options);
  return createVector(fn.kind, vecFromArray(out), resultNames(operands, plan.length));
}

export function unaryApply<K extends ElementKind>(
  fn: ElementFunction<K>,
  v: VectorLike,
  options?: EngineOptions
): AtomicVector {
  return elementwiseApply(fn, [v], options);
}

// =====================================================
// Rounding
// =====================================================

function roundHalfAway(x: number, digits: number): number {
  if (!Number.isFinite(x) || digits > 15) return x;
  const scaled =
    digits >= 0
      ? Math.round(Math.abs(x) * 10 ** digits) / 10 ** digits
      : Math.round(Math.abs(x) / 10 ** -digits) * 10 ** -digits;
  const r = Math.sign(x) * scaled;
  return r === 0 ? 0 : r;
}

/**
 * Round half away from zero to `decimals` places (negative: tens,
 * hundreds, ...). `decimals` is recycled against `v`.
 * Integer and logical input give integer; double gives double.
 */
export function roundTo(v: VectorLike, decimals: VectorLike = 0, options?: EngineOptions): AtomicVector {
  const x = asVector(v);
  const d = asVector(decimals);
  requireNonCharacter(x, 'roundTo');
  requireNonCharacter(d, 'roundTo');

  const kind: ElementKind = x.kind === 'double' ? 'double' : 'integer';
  const xs = toArray(x).map((cell) => coerce(cell, x.kind, kind));
  const ds = toArray(d).map((cell) => coerce(cell, d.kind, 'double'));
  const { value: plan, warning } = align(xs.length, ds.length);

  const overflow = new OverflowTally();
  const out: Cell[] = new Array(plan.length);
  for (let i = 0; i < plan.length; i++) {
    const value = xs[plan.indexA(i)];
    const digits = ds[plan.indexB(i)];
    if (typeof value !== 'number' || typeof digits !== 'number' || Number.isNaN(digits)) {
      out[i] = NA;
      continue;
    }
    const rounded = roundHalfAway(value, Math.trunc(digits));
    out[i] = kind === 'integer' ? overflow.check(rounded) : rounded;
  }

  reportWarnings([warning, overflow.warning()], options);
  return createVector(kind, vecFromArray(out), resultNames([x], plan.length));
}

// =====================================================
// Unary operators
// =====================================================

function mapCells(v: AtomicVector, kind: ElementKind, fn: (cell: Cell) => Cell): AtomicVector {
  return createVector(kind, vecFromArray(toArray(v).map(fn)), v.names);
}

/** Unary minus. Logical input gives integer. */
export function negate(v: VectorLike): AtomicVector {
  const x = asVector(v);
  requireNonCharacter(x, 'unary operator -');
  const kind: ElementKind = x.kind === 'double' ? 'double' : 'integer';
  return mapCells(x, kind, (cell) => {
    const n = coerce(cell, x.kind, kind);
    if (typeof n !== 'number') return NA;
    return kind === 'integer' && n === 0 ? 0 : -n;
  });
}

/** Logical negation; numbers count as true when non-zero. */
export function not(v: VectorLike): AtomicVector {
  const x = asVector(v);
  requireNonCharacter(x, 'unary operator !');
  return mapCells(x, 'logical', (cell) => {
    const b = castCell(cell, x.kind, 'logical').value;
    return typeof b === 'boolean' ? !b : NA;
  });
}

/** True where an element is NA (or a double NaN). */
export function isNA(v: VectorLike): AtomicVector {
  const x = asVector(v);
  return mapCells(x, 'logical', (cell) => cell === NA || (typeof cell === 'number' && Number.isNaN(cell)));
}

/**
 * Explicit conversion to `kind`, in either direction. Values that cannot
 * be represented become NA and raise one `CoercionWarning`.
 */
export function asKind(v: VectorLike, kind: ElementKind, options?: EngineOptions): AtomicVector {
  const x = asVector(v);
  let lost = 0;
  const result = mapCells(x, kind, (cell) => {
    const cast = castCell(cell, x.kind, kind);
    if (cast.lossy) lost++;
    return cast.value;
  });
  reportWarnings([lost > 0 ? new CoercionWarning(lost) : undefined], options);
  return result;
}
