/**
 * Database error classification
 *
 * @module error-classifier
 *
 * @remarks
 * The coordinator only needs to tell three kinds of failure apart: unique
 * violations (retried once by upsert), serialization failures (retried as a
 * whole transaction when configured) and everything else.
 */

import { SQLSTATE } from '../constants.js';

/** Category of a failed command */
export type ErrorCategory = 'unique-violation' | 'serialization-failure' | 'other';

/** Maps a rejection reason to its category */
export type ErrorClassifier = (error: unknown) => ErrorCategory;

/**
 * Reads a SQLSTATE code from an error-like value
 *
 * @returns The `code` property when it is a string, otherwise undefined
 */
export const getSqlState = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

/**
 * Classifies errors by their PostgreSQL SQLSTATE code
 *
 * @example
 * ```typescript
 * classifyBySqlState({ code: '23505' }); // => 'unique-violation'
 * classifyBySqlState(new Error('timeout')); // => 'other'
 * ```
 */
export const classifyBySqlState: ErrorClassifier = (error) => {
  switch (getSqlState(error)) {
    case SQLSTATE.UNIQUE_VIOLATION:
      return 'unique-violation';
    case SQLSTATE.SERIALIZATION_FAILURE:
      return 'serialization-failure';
    default:
      return 'other';
  }
};
