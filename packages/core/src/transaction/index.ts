export type { BulkInsertPlanInput } from './bulk-insert.js';
export {
  planBulkInsert,
  UNIQUE_INDEX_QUERY,
  uniqueConstraintsFromCatalog,
  validateBulkRows,
} from './bulk-insert.js';
export { runTransaction } from './run.js';
export type { RootScope, SavepointScope, Scope, ScopeState } from './scope.js';
export type { SavepointBody, TransactionBody, TransactionStatus } from './transaction.js';
export { Transaction } from './transaction.js';
