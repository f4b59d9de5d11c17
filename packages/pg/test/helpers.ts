import type { QueryConfig, QueryResult } from 'pg';
import { vi } from 'vitest';
import type { PgPoolClient } from '../src/index.js';

/** Builds a query result the way node-postgres reports one */
export const queryResult = (rows: QueryResult['rows'] = [], rowCount: number | null = rows.length): QueryResult => ({
  command: '',
  rowCount,
  oid: 0,
  fields: [],
  rows,
});

/**
 * Fake pool client answering every query from `respond`
 *
 * `escapeIdentifier` and `escapeLiteral` mimic node-postgres escaping.
 */
export const fakeClient = (respond: (config: QueryConfig) => Promise<QueryResult> = async () => queryResult()) => {
  const client = {
    query: vi.fn(respond),
    escapeIdentifier: vi.fn((str: string) => `"${str.replace(/"/g, '""')}"`),
    escapeLiteral: vi.fn((str: string) => `'${str.replace(/'/g, "''")}'`),
    release: vi.fn(),
  } satisfies PgPoolClient;
  return client;
};

/** SQL text of every query a fake client received */
export const sentSql = (client: ReturnType<typeof fakeClient>): string[] =>
  client.query.mock.calls.map(([config]) => config.text);
