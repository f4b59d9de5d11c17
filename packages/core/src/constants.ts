/** Constants and Default Values for Transactions */

/** Transaction isolation level accepted by `TransactionOptions.isolation` */
export type IsolationLevel = 'serializable' | 'repeatable_read' | 'read_committed' | 'read_uncommitted';

/** SQL rendering of each isolation level */
export const ISOLATION_LEVELS = {
  serializable: 'SERIALIZABLE',
  repeatable_read: 'REPEATABLE READ',
  read_committed: 'READ COMMITTED',
  read_uncommitted: 'READ UNCOMMITTED',
} as const satisfies Record<IsolationLevel, string>;

/** PostgreSQL SQLSTATE codes the coordinator reacts to */
export const SQLSTATE = {
  UNIQUE_VIOLATION: '23505',
  SERIALIZATION_FAILURE: '40001',
} as const;

/** Default configuration values for a transaction */
export const DEFAULTS = {
  DEFERRABLE: false,
  RETRY: false,
  AUTO_ROLLBACK_ON_ERROR: true,
} as const;
