/**
 * Construction-time and counter failures for the integer sequence generators.
 *
 * Every error carries a stable `code` so front ends (CLI exit paths, HTTP
 * 400 responses) can report it without matching on message text.
 */

export type IldsErrorCode =
  | 'INVALID_BASE'
  | 'INVALID_SCALE'
  | 'SCALE_OVERFLOW'
  | 'INVALID_SEED'
  | 'INVALID_COUNT'
  | 'COUNTER_OVERFLOW'
  | 'DIMENSION_MISMATCH'

/** Base class for all generator errors. */
export class IldsError extends Error {
  constructor(
    public readonly code: IldsErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'IldsError'
  }
}

/** Base is not an integer >= 2. Digit decomposition is undefined below 2. */
export class InvalidBaseError extends IldsError {
  constructor(public readonly base: number) {
    super('INVALID_BASE', `Base must be an integer >= 2, got ${base}`)
    this.name = 'InvalidBaseError'
  }
}

export class InvalidScaleError extends IldsError {
  constructor(public readonly scale: number) {
    super('INVALID_SCALE', `Scale must be a non-negative integer, got ${scale}`)
    this.name = 'InvalidScaleError'
  }
}

/** base^scale does not fit in a safe integer. */
export class ScaleOverflowError extends IldsError {
  constructor(
    public readonly base: number,
    public readonly scale: number,
  ) {
    super(
      'SCALE_OVERFLOW',
      `${base}^${scale} exceeds Number.MAX_SAFE_INTEGER (${Number.MAX_SAFE_INTEGER})`,
    )
    this.name = 'ScaleOverflowError'
  }
}

export class InvalidSeedError extends IldsError {
  constructor(public readonly seed: number) {
    super('INVALID_SEED', `Seed must be a non-negative safe integer, got ${seed}`)
    this.name = 'InvalidSeedError'
  }
}

export class InvalidCountError extends IldsError {
  constructor(public readonly count: number) {
    super('INVALID_COUNT', `Count must be a non-negative safe integer, got ${count}`)
    this.name = 'InvalidCountError'
  }
}

export class CounterOverflowError extends IldsError {
  constructor() {
    super('COUNTER_OVERFLOW', 'Sequence counter exceeded Number.MAX_SAFE_INTEGER')
    this.name = 'CounterOverflowError'
  }
}

export class DimensionMismatchError extends IldsError {
  constructor(message: string) {
    super('DIMENSION_MISMATCH', message)
    this.name = 'DimensionMismatchError'
  }
}

/** Narrow an unknown thrown value to a generator error. */
export function isIldsError(err: unknown): err is IldsError {
  return err instanceof IldsError
}
