/**
 * Connection Interfaces
 *
 * Driver-agnostic contract for the single asynchronous connection a
 * transaction runs on.
 *
 * @packageDocumentation
 */

/** A row returned by the database, keyed by column name */
export type Row = Record<string, unknown>;

/**
 * Result of one command
 */
export interface ResultSet {
  /** Rows returned by the command (empty for most DML without RETURNING) */
  rows: Row[];
  /** Number of rows affected or returned */
  rowCount: number;
}

/**
 * A parameterised SQL command
 *
 * @example
 * ```typescript
 * const command: SqlCommand = {
 *   sql: 'INSERT INTO "foo" ("bar") VALUES ($1)',
 *   params: ['baz'],
 * };
 * ```
 */
export interface SqlCommand {
  sql: string;
  params: readonly unknown[];
}

/**
 * Asynchronous database connection
 *
 * Commands passed to `execute` must reach the server in call order. The
 * transaction coordinator assumes it is the connection's only user for the
 * lifetime of a transaction.
 *
 * @example
 * ```typescript
 * const conn: Connection = {
 *   execute: async (sql, params) => {
 *     const result = await client.query({ text: sql, values: [...params] });
 *     return { rows: result.rows, rowCount: result.rowCount ?? 0 };
 *   },
 * };
 * ```
 */
export interface Connection {
  execute(sql: string, params: readonly unknown[]): Promise<ResultSet>;
}
