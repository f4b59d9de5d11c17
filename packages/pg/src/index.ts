/** @pg-txn/pg - node-postgres adapter for @pg-txn/core */

export type { PgClient } from './connection.js';
export { createPgConnection, createPgQuoter } from './connection.js';
export { classifyPgError } from './errors.js';
export type { PgPool, PgPoolClient } from './transaction.js';
export { withPooledTransaction, withTransaction } from './transaction.js';
export { pgLog } from './utils/debug.js';
