/** @pg-txn/core - Completion barriers and savepoint-aware transactions over one asynchronous connection */

// Barrier
export type { BarrierOutcome } from './barrier/index.js';
export { CompletionBarrier } from './barrier/index.js';
// Config
export { beginStatement, parseIsolationLevel, parseTransactionOptions, resolveTransactionOptions } from './config.js';
export type { ResolvedTransactionOptions, TransactionOptions } from './config.types.js';
// Constants
export type { IsolationLevel } from './constants.js';
export { DEFAULTS, ISOLATION_LEVELS, SQLSTATE } from './constants.js';
// Errors
export {
  BarrierClosedError,
  ConfigurationError,
  InvalidArgumentError,
  normalizeError,
  RollbackRequestedError,
  TransactionClosedError,
} from './errors.js';
// Interfaces
export type { Connection, ResultSet, Row, SqlCommand, UniqueConstraint } from './interfaces/index.js';
// Operations
export { bulkInsert, insertRow, upsertRow } from './operations.js';
// SQL
export type { SqlQuoter, SqlValue } from './sql/index.js';
export { insertSql, postgresQuoter, quoteIdentifier, quoteLiteral, toSqlCommand, upsertSql } from './sql/index.js';
// Transaction
export type {
  BulkInsertPlanInput,
  SavepointBody,
  TransactionBody,
  TransactionStatus,
} from './transaction/index.js';
export {
  planBulkInsert,
  runTransaction,
  Transaction,
  UNIQUE_INDEX_QUERY,
  uniqueConstraintsFromCatalog,
  validateBulkRows,
} from './transaction/index.js';
// Utils
export type { ErrorCategory, ErrorClassifier } from './utils/error-classifier.js';
export { classifyBySqlState, getSqlState } from './utils/error-classifier.js';
export { queryLog, retryLog, savepointLog, txnLog } from './utils/debug.js';
