/**
 * Transaction entry point
 *
 * @module transaction/run
 */

import type { TransactionOptions } from '../config.types.js';
import { resolveTransactionOptions } from '../config.js';
import type { Connection } from '../interfaces/index.js';
import { retryLog } from '../utils/debug.js';
import { Transaction, type TransactionBody } from './transaction.js';

/**
 * Runs `body` in a transaction on `conn`
 *
 * Options are validated before anything is sent. With `retry` enabled, a
 * transaction that fails with a serialization failure is rolled back and the
 * whole body is run again in a fresh transaction, for as long as it keeps
 * failing that way.
 *
 * @returns Resolves once the transaction has committed
 * @throws {ConfigurationError} If the options are invalid; no command is sent
 *
 * @example
 * ```typescript
 * await runTransaction(conn, { isolation: 'serializable', retry: true }, async (txn) => {
 *   await txn.insert('foo', { bar: 'baz' });
 * });
 * // BEGIN TRANSACTION ISOLATION LEVEL SERIALIZABLE
 * // INSERT INTO "foo" ("bar") VALUES ($1)
 * // COMMIT
 * ```
 */
export const runTransaction = async (
  conn: Connection,
  options: TransactionOptions,
  body: TransactionBody,
): Promise<void> => {
  const resolved = resolveTransactionOptions(options);

  for (let attempt = 1; ; attempt++) {
    try {
      await new Transaction(conn, resolved).run(body);
      return;
    } catch (error) {
      if (!resolved.retry || resolved.classifyError(error) !== 'serialization-failure') {
        throw error;
      }
      retryLog('serialization failure on attempt %d, running the transaction again', attempt);
    }
  }
};
