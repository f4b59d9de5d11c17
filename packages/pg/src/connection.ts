/**
 * node-postgres connection wrapper
 *
 * @module connection
 */

import { type Connection, quoteLiteral, type SqlQuoter } from '@pg-txn/core';
import type { QueryConfig, QueryResult } from 'pg';

/**
 * The part of a `pg.Client` or `pg.PoolClient` the adapter uses
 */
export interface PgClient {
  query(config: QueryConfig): Promise<QueryResult>;
  escapeIdentifier(str: string): string;
  escapeLiteral(str: string): string;
}

/**
 * Wraps a client as a `Connection`
 *
 * node-postgres queues queries per client and sends them in call order, so
 * commands reach the server in the order the transaction issues them.
 *
 * @example
 * ```typescript
 * const client = new pg.Client();
 * await client.connect();
 * await runTransaction(createPgConnection(client), {}, async (txn) => {
 *   await txn.insert('foo', { bar: 'baz' });
 * });
 * ```
 */
export const createPgConnection = (client: PgClient): Connection => ({
  execute: async (sql, params) => {
    const result = await client.query({ text: sql, values: [...params] });
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  },
});

/**
 * Quoter that escapes names and strings with the client's own escaping
 *
 * Non-string values use the same rendering as the default quoter.
 */
export const createPgQuoter = (client: PgClient): SqlQuoter => ({
  quoteIdentifier: (name) => client.escapeIdentifier(name),
  quoteLiteral: (value) => (typeof value === 'string' ? client.escapeLiteral(value) : quoteLiteral(value)),
});
