/**
 * Identifier and literal quoting for PostgreSQL
 *
 * @module sql/quote
 */

/** Values the bulk-insert planner can render as SQL literals */
export type SqlValue = string | number | bigint | boolean | Date | null;

/**
 * Quoting strategy handed to code that renders values inline
 *
 * @example
 * ```typescript
 * const quoter: SqlQuoter = {
 *   quoteIdentifier: (name) => client.escapeIdentifier(name),
 *   quoteLiteral: (value) => (typeof value === 'string' ? client.escapeLiteral(value) : quoteLiteral(value)),
 * };
 * ```
 */
export interface SqlQuoter {
  quoteIdentifier(name: string): string;
  quoteLiteral(value: SqlValue): string;
}

/**
 * Quotes a table or column name so that it is always valid
 *
 * @example
 * ```typescript
 * quoteIdentifier('user data'); // => '"user data"'
 * quoteIdentifier('say "hi"'); // => '"say ""hi"""'
 * ```
 */
export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

const quoteString = (value: string): string => {
  const doubled = value.replace(/'/g, "''");
  if (!value.includes('\\')) {
    return `'${doubled}'`;
  }
  return `E'${doubled.replace(/\\/g, '\\\\')}'`;
};

/**
 * Renders a value as a PostgreSQL literal
 *
 * @example
 * ```typescript
 * quoteLiteral("it's"); // => "'it''s'"
 * quoteLiteral(42); // => '42'
 * quoteLiteral(null); // => 'NULL'
 * ```
 */
export const quoteLiteral = (value: SqlValue): string => {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : `'${String(value)}'`;
  }
  if (value instanceof Date) {
    return quoteString(value.toISOString());
  }
  return quoteString(value);
};

/** Default quoter, independent of any driver */
export const postgresQuoter: SqlQuoter = {
  quoteIdentifier,
  quoteLiteral,
};
