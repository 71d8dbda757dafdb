/**
 * Errors and warnings raised by vector operations.
 *
 * Errors abort the call that raised them before anything is mutated.
 * Warnings are never thrown; they travel beside a fully computed result
 * and are delivered through the warning handler (see `options.ts`).
 */

export type VectorErrorCode =
  | 'MIXED_SIGN_INDEX'
  | 'INVALID_STEP'
  | 'INCOMPATIBLE_LENGTH'
  | 'INVALID_INDEX'
  | 'INVALID_ARGUMENT'
  | 'NON_NUMERIC_ARGUMENT'
  | 'COERCION_DIRECTION';

export type VectorWarningCode = 'RECYCLE_LENGTH' | 'COERCION_NA' | 'INTEGER_OVERFLOW';

export class VectorError extends Error {
  readonly code: VectorErrorCode;

  constructor(code: VectorErrorCode, message: string) {
    super(message);
    this.name = 'VectorError';
    this.code = code;
  }
}

export class MixedSignIndexError extends VectorError {
  constructor() {
    super('MIXED_SIGN_INDEX', "can't mix positive and negative subscripts");
    this.name = 'MixedSignIndexError';
  }
}

export class InvalidStepError extends VectorError {
  constructor(
    message: string,
    public readonly from: number,
    public readonly to: number,
    public readonly step: number
  ) {
    super('INVALID_STEP', message);
    this.name = 'InvalidStepError';
  }
}

export class IncompatibleLengthError extends VectorError {
  constructor(
    public readonly lengths: readonly number[],
    message = `cannot recycle a zero-length operand against length ${Math.max(...lengths)}`
  ) {
    super('INCOMPATIBLE_LENGTH', message);
    this.name = 'IncompatibleLengthError';
  }
}

export class InvalidIndexError extends VectorError {
  constructor(message: string) {
    super('INVALID_INDEX', message);
    this.name = 'InvalidIndexError';
  }
}

export class InvalidArgumentError extends VectorError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class NonNumericArgumentError extends VectorError {
  constructor(operation: string) {
    super('NON_NUMERIC_ARGUMENT', `non-numeric argument to ${operation}`);
    this.name = 'NonNumericArgumentError';
  }
}

export class CoercionDirectionError extends VectorError {
  constructor(from: string, to: string) {
    super('COERCION_DIRECTION', `cannot implicitly coerce ${from} down to ${to}`);
    this.name = 'CoercionDirectionError';
  }
}

// =====================================================
// Warnings
// =====================================================

export class VectorWarning extends Error {
  readonly code: VectorWarningCode;

  constructor(code: VectorWarningCode, message: string) {
    super(message);
    this.name = 'VectorWarning';
    this.code = code;
  }
}

export class RecycleLengthWarning extends VectorWarning {
  constructor(
    public readonly longer: number,
    public readonly shorter: number
  ) {
    super(
      'RECYCLE_LENGTH',
      `longer object length (${longer}) is not a multiple of shorter object length (${shorter})`
    );
    this.name = 'RecycleLengthWarning';
  }
}

export class CoercionWarning extends VectorWarning {
  constructor(public readonly count: number) {
    super('COERCION_NA', `NAs introduced by coercion (${count})`);
    this.name = 'CoercionWarning';
  }
}

export class IntegerOverflowWarning extends VectorWarning {
  constructor(public readonly count: number) {
    super('INTEGER_OVERFLOW', `NAs produced by integer overflow (${count})`);
    this.name = 'IntegerOverflowWarning';
  }
}
