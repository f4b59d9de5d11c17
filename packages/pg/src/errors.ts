/**
 * node-postgres error classification
 *
 * @module errors
 */

import { type ErrorClassifier, SQLSTATE } from '@pg-txn/core';
import { DatabaseError } from 'pg';

/**
 * Classifies errors reported by the server through node-postgres
 *
 * Anything that is not a `pg.DatabaseError` (connection loss, client-side
 * errors) is `'other'`.
 *
 * @example
 * ```typescript
 * await runTransaction(conn, { retry: true, classifyError: classifyPgError }, body);
 * ```
 */
export const classifyPgError: ErrorClassifier = (error) => {
  if (!(error instanceof DatabaseError)) {
    return 'other';
  }
  switch (error.code) {
    case SQLSTATE.UNIQUE_VIOLATION:
      return 'unique-violation';
    case SQLSTATE.SERIALIZATION_FAILURE:
      return 'serialization-failure';
    default:
      return 'other';
  }
};
