export { toSqlCommand } from './compiled.js';
export { insertSql } from './insert.js';
export type { SqlQuoter, SqlValue } from './quote.js';
export { postgresQuoter, quoteIdentifier, quoteLiteral } from './quote.js';
export { upsertSql } from './upsert.js';
