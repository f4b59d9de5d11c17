/**
 * One-shot helpers for use outside an explicit transaction
 *
 * @module operations
 */

import type { TransactionOptions } from './config.types.js';
import type { Connection, ResultSet, Row } from './interfaces/index.js';
import { insertSql, type SqlValue, upsertSql } from './sql/index.js';
import { runTransaction } from './transaction/index.js';
import { queryLog, retryLog } from './utils/debug.js';
import { classifyBySqlState, type ErrorClassifier } from './utils/error-classifier.js';

/**
 * Inserts one row with a single INSERT and no surrounding transaction
 *
 * @example
 * ```typescript
 * await insertRow(conn, 'foo', { bar: 'baz' });
 * // INSERT INTO "foo" ("bar") VALUES ($1)
 * ```
 */
export const insertRow = (conn: Connection, table: string, fields: Record<string, unknown>): Promise<ResultSet> => {
  const { sql, params } = insertSql(table, fields);
  queryLog('%s %o', sql, params);
  return conn.execute(sql, params);
};

/**
 * Updates or inserts one row with no surrounding transaction
 *
 * A unique violation (another writer inserted the same key between the
 * UPDATE and the INSERT) is retried once.
 *
 * @returns The updated or inserted row
 */
export const upsertRow = async (
  conn: Connection,
  table: string,
  keyFields: string | readonly string[],
  fields: Record<string, unknown>,
  classifyError: ErrorClassifier = classifyBySqlState,
): Promise<Row | undefined> => {
  const { sql, params } = upsertSql(table, keyFields, fields);
  queryLog('%s %o', sql, params);

  try {
    const result = await conn.execute(sql, params);
    return result.rows[0];
  } catch (error) {
    if (classifyError(error) !== 'unique-violation') {
      throw error;
    }
    retryLog('upsert into %s hit a unique violation, retrying once', table);
    queryLog('%s %o', sql, params);
    const result = await conn.execute(sql, params);
    return result.rows[0];
  }
};

/**
 * Inserts many rows in their own transaction, skipping rows that collide with a unique index
 *
 * @returns Number of rows inserted
 */
export const bulkInsert = async (
  conn: Connection,
  table: string,
  columns: readonly string[],
  rows: readonly (readonly SqlValue[])[],
  options: TransactionOptions = {},
): Promise<number> => {
  let inserted = 0;
  await runTransaction(conn, options, async (txn) => {
    inserted = await txn.bulkInsert(table, columns, rows);
  });
  return inserted;
};
