/**
 * UPDATE-or-INSERT statement generation
 *
 * @module sql/upsert
 */

import { InvalidArgumentError } from '../errors.js';
import type { SqlCommand } from '../interfaces/index.js';
import { quoteIdentifier } from './quote.js';

/**
 * Builds a single statement that updates the row matching `keyFields`, or
 * inserts `fields` as a new row when nothing matched
 *
 * The affected row is returned either way. Two concurrent upserts of the same
 * key can still collide on a unique index; callers are expected to retry once
 * on a unique violation.
 *
 * @throws {InvalidArgumentError} If no key field is given, or a key field is missing from `fields`
 *
 * @example
 * ```typescript
 * upsertSql('foo', 'wombat', { bar: 'baz', wombat: 42 });
 * // => {
 * //   sql: 'WITH update_query AS (UPDATE "foo" SET "bar"=$1 WHERE "wombat"=$2 RETURNING *), ' +
 * //     'insert_query AS (INSERT INTO "foo" ("bar","wombat") SELECT $1,$2 ' +
 * //     'WHERE NOT EXISTS (SELECT * FROM update_query) RETURNING *) ' +
 * //     'SELECT * FROM update_query UNION SELECT * FROM insert_query',
 * //   params: ['baz', 42],
 * // }
 * ```
 */
export const upsertSql = (
  table: string,
  keyFields: string | readonly string[],
  fields: Record<string, unknown>,
): SqlCommand => {
  const keys = typeof keyFields === 'string' ? [keyFields] : [...keyFields];
  if (keys.length === 0) {
    throw new InvalidArgumentError(`upsert into "${table}" requires at least one key field`);
  }

  const names = Object.keys(fields);
  const missing = keys.filter((key) => !names.includes(key));
  if (missing.length > 0) {
    throw new InvalidArgumentError(
      `upsert into "${table}": key field(s) ${missing.map((key) => `"${key}"`).join(', ')} not present in data`,
    );
  }

  const assign = (name: string): string => `${quoteIdentifier(name)}=$${names.indexOf(name) + 1}`;
  const updated = names.filter((name) => !keys.includes(name));
  // With nothing but keys to write, a self-assignment still yields the matched row.
  const setList = (updated.length > 0 ? updated : keys).map(assign).join(',');
  const where = keys.map(assign).join(' AND ');
  const tbl = quoteIdentifier(table);
  const columns = names.map(quoteIdentifier).join(',');
  const placeholders = names.map((_, i) => `$${i + 1}`).join(',');

  return {
    sql:
      `WITH update_query AS (UPDATE ${tbl} SET ${setList} WHERE ${where} RETURNING *), ` +
      `insert_query AS (INSERT INTO ${tbl} (${columns}) SELECT ${placeholders} ` +
      `WHERE NOT EXISTS (SELECT * FROM update_query) RETURNING *) ` +
      `SELECT * FROM update_query UNION SELECT * FROM insert_query`,
    params: Object.values(fields),
  };
};
