/**
 * INSERT statement generation
 *
 * @module sql/insert
 */

import type { SqlCommand } from '../interfaces/index.js';
import { quoteIdentifier } from './quote.js';

/**
 * Builds a parameterised single-row INSERT
 *
 * Field names come from the keys of `fields`, parameters from its values, in
 * insertion order.
 *
 * @example
 * ```typescript
 * insertSql('foo', { bar: 'baz', wombat: 42 });
 * // => {
 * //   sql: 'INSERT INTO "foo" ("bar","wombat") VALUES ($1,$2)',
 * //   params: ['baz', 42],
 * // }
 * ```
 */
export const insertSql = (table: string, fields: Record<string, unknown>): SqlCommand => {
  const names = Object.keys(fields);
  if (names.length === 0) {
    return { sql: `INSERT INTO ${quoteIdentifier(table)} DEFAULT VALUES`, params: [] };
  }

  const columns = names.map(quoteIdentifier).join(',');
  const placeholders = names.map((_, i) => `$${i + 1}`).join(',');

  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns}) VALUES (${placeholders})`,
    params: Object.values(fields),
  };
};
