/**
 * Internal modules barrel export
 */

// Constants
export { VECTOR, INT_MAX, INT_MIN, MAX_LENGTH } from './constants';

// Vec (bit-trie)
export {
  emptyVec,
  vecPush,
  vecGet,
  vecReader,
  vecAssoc,
  vecFromArray,
  vecResize,
  vecToArray,
  vecIter,
} from './vec';

// HAMT
export { hamtEmpty, hamtGet, hamtSet, type HMap } from './hamt';

// Types
export type { Owner, Vec } from './types';
