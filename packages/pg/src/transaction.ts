/**
 * Transaction entry points for node-postgres clients and pools
 *
 * @module transaction
 */

import { runTransaction, type TransactionBody, type TransactionOptions } from '@pg-txn/core';
import { createPgConnection, createPgQuoter, type PgClient } from './connection.js';
import { classifyPgError } from './errors.js';
import { pgLog } from './utils/debug.js';

/** A client checked out of a pool */
export interface PgPoolClient extends PgClient {
  release(err?: Error | boolean): void;
}

/** The part of a `pg.Pool` the adapter uses */
export interface PgPool {
  connect(): Promise<PgPoolClient>;
}

/**
 * Runs `body` in a transaction on `client`
 *
 * Errors are classified with {@link classifyPgError} and bulk-insert values
 * are escaped by the client, unless `options` says otherwise. The client must
 * not be used by anything else until the returned promise settles.
 */
export const withTransaction = (client: PgClient, options: TransactionOptions, body: TransactionBody): Promise<void> =>
  runTransaction(
    createPgConnection(client),
    { classifyError: classifyPgError, quoter: createPgQuoter(client), ...options },
    body,
  );

/**
 * Checks a client out of `pool`, runs `body` in a transaction on it and releases it
 *
 * The client is held for every retry of the transaction and released once,
 * whatever the outcome.
 *
 * @example
 * ```typescript
 * const pool = new pg.Pool();
 * await withPooledTransaction(pool, { isolation: 'serializable', retry: true }, async (txn) => {
 *   await txn.upsert('counters', 'name', { name: 'visits', total: 1 });
 * });
 * ```
 */
export const withPooledTransaction = async (
  pool: PgPool,
  options: TransactionOptions,
  body: TransactionBody,
): Promise<void> => {
  const client = await pool.connect();
  pgLog('acquired client');
  try {
    await withTransaction(client, options, body);
  } finally {
    client.release();
    pgLog('released client');
  }
};
