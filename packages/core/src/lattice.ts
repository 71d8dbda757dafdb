/**
 * Element kinds and the coercion lattice
 *
 *   logical < integer < double < character
 *
 * Implicit conversion only ever moves up this order, through `coerce`.
 * `castCell` is the explicit conversion used by `asKind` and the logical
 * operators, and may move in either direction.
 */

import { CoercionDirectionError } from './errors';
import { INT_MAX, INT_MIN } from './internal';

/** Missing value. Its kind is the kind of the vector holding it. */
export const NA: unique symbol = Symbol('NA');
export type NA = typeof NA;

export type ElementKind = 'logical' | 'integer' | 'double' | 'character';

export const KINDS: readonly ElementKind[] = ['logical', 'integer', 'double', 'character'];

export interface KindValues {
  logical: boolean;
  integer: number;
  double: number;
  character: string;
}

/** A single element of some vector, or a scalar operand. */
export type Cell = boolean | number | string | NA;

export type CellOf<K extends ElementKind> = KindValues[K] | NA;

const RANKS: Record<ElementKind, number> = {
  logical: 0,
  integer: 1,
  double: 2,
  character: 3,
};

export function rankOf(kind: ElementKind): number {
  return RANKS[kind];
}

/** Highest kind among `kinds`; logical when there are none. */
export function maxKind(...kinds: ElementKind[]): ElementKind {
  let best: ElementKind = 'logical';
  for (const kind of kinds) {
    if (RANKS[kind] > RANKS[best]) best = kind;
  }
  return best;
}

/** Kind a bare scalar takes when it becomes a length-1 vector. */
export function kindOfScalar(value: Cell): ElementKind {
  switch (typeof value) {
    case 'boolean':
      return 'logical';
    case 'number':
      return 'double';
    case 'string':
      return 'character';
    default:
      return 'logical';
  }
}

export function isWholeInt(n: number): boolean {
  return Number.isInteger(n) && n >= INT_MIN && n <= INT_MAX;
}

export function checkCell(kind: ElementKind, value: Cell): boolean {
  if (value === NA) return true;
  switch (kind) {
    case 'logical':
      return typeof value === 'boolean';
    case 'integer':
      return typeof value === 'number' && isWholeInt(value);
    case 'double':
      return typeof value === 'number';
    case 'character':
      return typeof value === 'string';
  }
}

// =====================================================
// Rendering
// =====================================================

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'Inf';
  if (n === -Infinity) return '-Inf';
  if (n === 0) return '0';
  // 15 significant digits, then the shortest text for what remains
  const text = String(Number(n.toPrecision(15)));
  return text.replace(/e(?<sign>[+-])(?<digit>\d)$/, 'e$<sign>0$<digit>');
}

function render(value: boolean | number | string): string {
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') return formatNumber(value);
  return value;
}

// =====================================================
// Implicit (upward) coercion
// =====================================================

export function coerce(value: Cell, from: ElementKind, to: ElementKind): Cell {
  if (RANKS[to] < RANKS[from]) {
    throw new CoercionDirectionError(from, to);
  }
  if (value === NA || from === to) return value;

  switch (to) {
    case 'integer':
    case 'double':
      return typeof value === 'boolean' ? Number(value) : value;
    case 'character':
      return render(value);
    default:
      return value;
  }
}

// =====================================================
// Explicit conversion
// =====================================================

export interface CastResult {
  value: Cell;
  /** A non-missing input became NA */
  lossy: boolean;
}

const TRUE_WORDS = new Set(['TRUE', 'true', 'T', 'True']);
const FALSE_WORDS = new Set(['FALSE', 'false', 'F', 'False']);
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX = /^([+-]?)0[xX]([0-9a-fA-F]+)$/;

/** Numeric value of a character element, or NA. */
export function parseNumeral(text: string): number | NA {
  const s = text.trim();
  if (DECIMAL.test(s)) return Number(s);

  const hex = HEX.exec(s);
  if (hex) {
    const n = parseInt(hex[2], 16);
    return hex[1] === '-' ? -n : n;
  }

  switch (s) {
    case 'Inf':
    case '+Inf':
    case 'inf':
      return Infinity;
    case '-Inf':
    case '-inf':
      return -Infinity;
    case 'NaN':
      return NaN;
    default:
      return NA;
  }
}

function toInteger(n: number): CastResult {
  if (Number.isNaN(n)) return { value: NA, lossy: false };
  const t = Math.trunc(n);
  if (!isWholeInt(t)) return { value: NA, lossy: true };
  return { value: t === 0 ? 0 : t, lossy: false };
}

export function castCell(value: Cell, from: ElementKind, to: ElementKind): CastResult {
  if (value === NA) return { value: NA, lossy: false };
  if (RANKS[to] >= RANKS[from]) return { value: coerce(value, from, to), lossy: false };

  switch (to) {
    case 'logical': {
      if (typeof value === 'string') {
        if (TRUE_WORDS.has(value)) return { value: true, lossy: false };
        if (FALSE_WORDS.has(value)) return { value: false, lossy: false };
        return { value: NA, lossy: false };
      }
      if (typeof value === 'number') {
        return { value: Number.isNaN(value) ? NA : value !== 0, lossy: false };
      }
      return { value, lossy: false };
    }

    case 'integer': {
      if (typeof value === 'string') {
        const n = parseNumeral(value);
        if (n === NA) return { value: NA, lossy: value.trim() !== 'NA' };
        return toInteger(n);
      }
      if (typeof value === 'number') return toInteger(value);
      return { value: Number(value), lossy: false };
    }

    case 'double': {
      if (typeof value === 'string') {
        const n = parseNumeral(value);
        return { value: n, lossy: n === NA && value.trim() !== 'NA' };
      }
      return { value: Number(value), lossy: false };
    }

    default:
      return { value: coerce(value, from, to), lossy: false };
  }
}
