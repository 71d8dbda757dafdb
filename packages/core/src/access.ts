/**
 * Extraction: read a subset of a vector into a new vector.
 */

import { vecFromArray, vecReader } from './internal';
import { NA, type Cell } from './lattice';
import { resolveIndex, type IndexSpec } from './resolve';
import { createVector, length, type AtomicVector } from './store';

/**
 * Elements of `v` selected by `spec`, in spec order. Slots with no element
 * read as NA of `v`'s kind and, when `v` is named, carry the name "".
 */
export function extract(v: AtomicVector, spec: IndexSpec): AtomicVector {
  const { positions } = resolveIndex(v, spec, 'read');
  const n = length(v);
  const readCell = vecReader(v.data);

  const cells: Cell[] = positions.map((p) => (p >= 0 && p < n ? readCell(p) ?? NA : NA));
  if (!v.names) {
    return createVector(v.kind, vecFromArray(cells));
  }

  const readName = vecReader(v.names);
  const names = positions.map((p) => (p >= 0 && p < n ? readName(p) ?? '' : ''));
  return createVector(v.kind, vecFromArray(cells), vecFromArray(names));
}
