/**
 * Bulk-Insert Planner
 *
 * Turns a batch of rows into one INSERT that skips rows colliding with a
 * unique index instead of aborting the whole batch.
 *
 * @module transaction/bulk-insert
 */

import { InvalidArgumentError } from '../errors.js';
import type { Row, SqlCommand, UniqueConstraint } from '../interfaces/index.js';
import type { SqlQuoter, SqlValue } from '../sql/index.js';

/**
 * Lists the columns of every unique index on the table given as `$1`
 *
 * One row per indexed column: `idxid` groups columns by index, `generated`
 * flags columns the database fills in itself (defaults, identity, generated).
 */
export const UNIQUE_INDEX_QUERY = [
  'SELECT a.attrelid, i.indexrelid::text AS idxid, a.attname AS name,',
  "(a.atthasdef OR a.attidentity <> '' OR a.attgenerated <> '') AS generated",
  'FROM pg_catalog.pg_index i',
  'JOIN pg_catalog.pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)',
  'WHERE i.indrelid = $1::regclass AND i.indisunique',
  'ORDER BY i.indexrelid, a.attnum',
].join(' ');

/**
 * Groups catalog rows into unique constraints
 *
 * Columns filled in by the database cannot collide with caller-supplied data,
 * so they are left out of the match; an index left with no columns is dropped.
 */
export const uniqueConstraintsFromCatalog = (rows: readonly Row[]): UniqueConstraint[] => {
  const groups = new Map<string, string[]>();

  for (const row of rows) {
    const name = String(row.idxid);
    const fields = groups.get(name) ?? [];
    groups.set(name, fields);
    if (row.generated !== true) {
      fields.push(String(row.name));
    }
  }

  return [...groups]
    .filter(([, fields]) => fields.length > 0)
    .map(([name, fields]) => ({ name, fields }));
};

/**
 * Checks that every row has one value per column
 *
 * @throws {InvalidArgumentError} On an empty column list or a row of the wrong width
 */
export const validateBulkRows = (
  table: string,
  columns: readonly string[],
  rows: readonly (readonly SqlValue[])[],
): void => {
  if (columns.length === 0) {
    throw new InvalidArgumentError(`bulk insert into "${table}" requires at least one column`);
  }
  rows.forEach((row, index) => {
    if (row.length !== columns.length) {
      throw new InvalidArgumentError(
        `bulk insert into "${table}": row ${index} has ${row.length} value(s), expected ${columns.length}`,
      );
    }
  });
};

export interface BulkInsertPlanInput {
  table: string;
  columns: readonly string[];
  rows: readonly (readonly SqlValue[])[];
  constraints: readonly UniqueConstraint[];
  quoter: SqlQuoter;
}

/**
 * Builds the INSERT for a batch of rows
 *
 * Without unique constraints this is a plain multi-row INSERT. Otherwise the
 * rows are selected from a VALUES list through a NOT EXISTS anti-join on each
 * constraint, so rows that would violate one are skipped and the affected-row
 * count may be lower than the number of rows.
 *
 * @throws {InvalidArgumentError} If a unique constraint uses a column that is not being inserted
 *
 * @example
 * ```typescript
 * planBulkInsert({
 *   table: 'foo',
 *   columns: ['bar', 'baz'],
 *   rows: [[1, 'x'], [3, 'y']],
 *   constraints: [{ name: '1', fields: ['bar'] }],
 *   quoter: postgresQuoter,
 * }).sql;
 * // => 'INSERT INTO "foo" ("bar", "baz") (SELECT * FROM (VALUES (1, \'x\'), (3, \'y\')) AS src ("bar", "baz") ' +
 * //    'WHERE NOT EXISTS (SELECT 1 FROM "foo" AS dst WHERE (src."bar"=dst."bar")))'
 * ```
 */
export const planBulkInsert = (input: BulkInsertPlanInput): SqlCommand => {
  const { table, columns, rows, constraints, quoter } = input;

  const uncovered = [
    ...new Set(constraints.flatMap((constraint) => constraint.fields.filter((field) => !columns.includes(field)))),
  ];
  if (uncovered.length > 0) {
    throw new InvalidArgumentError(
      `bulk insert into "${table}": unique index column(s) ${uncovered
        .map((field) => `"${field}"`)
        .join(', ')} missing from the inserted columns; colliding rows could not be detected`,
    );
  }

  const tbl = quoter.quoteIdentifier(table);
  const columnList = columns.map((column) => quoter.quoteIdentifier(column)).join(', ');
  const values = rows.map((row) => `(${row.map((value) => quoter.quoteLiteral(value)).join(', ')})`).join(', ');

  if (constraints.length === 0) {
    return { sql: `INSERT INTO ${tbl} (${columnList}) VALUES ${values}`, params: [] };
  }

  const matches = constraints
    .map((constraint) => {
      const conditions = constraint.fields.map((field) => {
        const column = quoter.quoteIdentifier(field);
        return `src.${column}=dst.${column}`;
      });
      return `(${conditions.join(' AND ')})`;
    })
    .join(' OR ');

  return {
    sql:
      `INSERT INTO ${tbl} (${columnList}) ` +
      `(SELECT * FROM (VALUES ${values}) AS src (${columnList}) ` +
      `WHERE NOT EXISTS (SELECT 1 FROM ${tbl} AS dst WHERE ${matches}))`,
    params: [],
  };
};
