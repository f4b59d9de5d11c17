/**
 * Error types raised by the transaction helpers
 *
 * @module errors
 *
 * @remarks
 * Usage errors are detected before anything is sent to the database.
 * Failures reported by the database are passed through untouched, so callers
 * can inspect driver-specific fields such as the SQLSTATE code.
 */

/** A command was issued against a transaction or savepoint that has already finished */
export class TransactionClosedError extends Error {
  constructor(message = 'Cannot execute a command in a transaction that has been closed') {
    super(message);
    this.name = 'TransactionClosedError';
  }
}

/** A future was added to, or a second close attempted on, a closed completion barrier */
export class BarrierClosedError extends Error {
  constructor(message = 'This completion barrier is closed') {
    super(message);
    this.name = 'BarrierClosedError';
  }
}

/** Invalid transaction configuration */
export class ConfigurationError extends Error {
  constructor(
    public readonly option: string,
    message: string,
  ) {
    super(`Invalid value for option "${option}": ${message}`);
    this.name = 'ConfigurationError';
  }
}

/** Arguments to a SQL helper that cannot produce a correct statement */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** Default cause recorded when `rollback()` is called without a reason */
export class RollbackRequestedError extends Error {
  constructor(message = 'Rollback requested') {
    super(message);
    this.name = 'RollbackRequestedError';
  }
}

/**
 * Normalizes any thrown value to an Error instance
 *
 * @example
 * ```typescript
 * normalizeError('boom'); // => Error('boom')
 * ```
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};
