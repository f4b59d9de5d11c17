/**
 * Bridge from query builders to plain commands
 *
 * @module sql/compiled
 */

import type { Compilable } from 'kysely';
import type { SqlCommand } from '../interfaces/index.js';

/**
 * Compiles a Kysely query into the `{ sql, params }` pair a connection runs
 *
 * @example
 * ```typescript
 * toSqlCommand(db.deleteFrom('foo').where('id', '>', 20));
 * // => { sql: 'delete from "foo" where "id" > $1', params: [20] }
 * ```
 */
export const toSqlCommand = (query: Compilable): SqlCommand => {
  const { sql, parameters } = query.compile();
  return { sql, params: parameters };
};
