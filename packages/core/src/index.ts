/**
 * Vecta – atomic vectors
 *
 * - combine / sequence / repeat → build one-dimensional typed vectors
 * - extract(v, spec)            → positions, exclusions, masks or names
 * - assign(v, spec, rhs)        → write in place, growing and promoting
 * - binaryOp / elementwiseApply → elementwise work with recycling
 *
 * Element kinds are ordered logical < integer < double < character;
 * mixing kinds always moves up that order.
 */

// Lattice
export {
  NA,
  KINDS,
  rankOf,
  maxKind,
  kindOfScalar,
  coerce,
  castCell,
  checkCell,
  formatNumber,
  parseNumeral,
  type Cell,
  type CellOf,
  type CastResult,
  type ElementKind,
  type KindValues,
} from './lattice';

// Construction, length and names
export {
  vectorOf,
  naOf,
  combine,
  asVector,
  isVector,
  sequence,
  repeat,
  length,
  kindOf,
  toArray,
  at,
  names,
  setNames,
  type AtomicVector,
  type VectorLike,
  type RepeatOptions,
} from './store';

// Indexing
export { resolveIndex, MISSING, type IndexSpec, type ResolveMode, type Resolution } from './resolve';
export { extract } from './access';
export { assign, copyVector } from './mutate';

// Recycling
export { align, alignAll, recycleTo, type Recycled, type RecyclePlan, type MultiRecyclePlan } from './recycle';

// Elementwise operations
export {
  binaryOp,
  elementwiseApply,
  unaryApply,
  roundTo,
  negate,
  not,
  isNA,
  asKind,
  type ArithmeticOp,
  type ComparisonOp,
  type LogicalOp,
  type BinaryOp,
  type ElementFunction,
} from './ops';

// Errors, warnings and options
export {
  VectorError,
  MixedSignIndexError,
  InvalidStepError,
  IncompatibleLengthError,
  InvalidIndexError,
  InvalidArgumentError,
  NonNumericArgumentError,
  CoercionDirectionError,
  VectorWarning,
  RecycleLengthWarning,
  CoercionWarning,
  IntegerOverflowWarning,
  type VectorErrorCode,
  type VectorWarningCode,
} from './errors';
export { configure, resetConfiguration, type EngineOptions, type WarningHandler } from './options';
