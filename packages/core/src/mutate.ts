/**
 * Indexed assignment
 *
 * Resolution, recycling and coercion all run before the first write, so a
 * failing call leaves the target untouched. The target needs exclusive
 * access for the duration of the call.
 */

import { MAX_LENGTH, vecAssoc, vecFromArray, vecResize, type Owner } from './internal';
import { InvalidArgumentError } from './errors';
import { NA, coerce, maxKind } from './lattice';
import { reportWarnings, type EngineOptions } from './options';
import { recycleTo } from './recycle';
import { resolveIndex, type IndexSpec } from './resolve';
import { asVector, length, toArray, type AtomicVector, type VectorLike } from './store';

/**
 * Write `rhs` into the positions `spec` selects, growing `v` past its end
 * and promoting its kind when needed. Returns `v` itself.
 *
 * @throws IncompatibleLengthError when `rhs` is empty but targets exist
 * @throws InvalidArgumentError when a target lies past the longest vector
 */
export function assign(
  v: AtomicVector,
  spec: IndexSpec,
  rhs: VectorLike,
  options?: EngineOptions
): AtomicVector {
  const value = asVector(rhs);
  const { positions, highest, grownNames } = resolveIndex(v, spec, 'write');
  if (positions.length === 0) return v;
  if (highest > MAX_LENGTH) {
    throw new InvalidArgumentError(`cannot grow a vector to length ${highest}`);
  }

  const { value: sourceIndex, warning } = recycleTo(length(value), positions.length);
  const kind = maxKind(v.kind, value.kind);
  const source = toArray(value).map((cell) => coerce(cell, value.kind, kind));

  const owner: Owner = {};
  const n = length(v);
  let data = kind === v.kind ? v.data : vecFromArray(toArray(v).map((cell) => coerce(cell, v.kind, kind)));
  let names = v.names;

  if (!names && grownNames.size > 0) {
    names = vecFromArray(Array.from({ length: n }, () => ''));
  }

  // Resize with fill: NA cells and "" names up to the highest target
  data = vecResize(data, owner, highest, () => NA);
  if (names) names = vecResize(names, owner, highest, (i) => grownNames.get(i) ?? '');

  positions.forEach((p, i) => {
    data = vecAssoc(data, owner, p, source[sourceIndex(i)]);
  });

  if (names !== v.names) v.nameIndex = undefined;
  v.kind = kind;
  v.data = data;
  v.names = names;

  reportWarnings([warning], options);
  return v;
}

/** Copy of `v` sharing storage; writes to either never reach the other. */
export function copyVector(v: AtomicVector): AtomicVector {
  return { ...v, nameIndex: undefined };
}
