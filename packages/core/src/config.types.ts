import type { IsolationLevel } from './constants.js';
import type { SqlQuoter } from './sql/index.js';
import type { ErrorClassifier } from './utils/error-classifier.js';

/** Options for opening a transaction */
export interface TransactionOptions {
  /** Isolation level added to BEGIN (default: the server's default) */
  isolation?: IsolationLevel;
  /** Append `DEFERRABLE` to BEGIN (default: false) */
  deferrable?: boolean;
  /**
   * Re-run the whole transaction body when it fails with a serialization failure
   *
   * There is no limit on the number of attempts and no backoff. The body runs
   * again from the start, including any side effects outside the database.
   *
   * @default false
   */
  retry?: boolean;
  /** Categorises command failures (default: by SQLSTATE `code` property) */
  classifyError?: ErrorClassifier;
  /** Quoting used when rendering bulk-insert values inline (default: `postgresQuoter`) */
  quoter?: SqlQuoter;
  /** Produces savepoint names, which must be unique within a transaction (default: cuid2) */
  generateSavepointId?: () => string;
}

/** Transaction options with defaults applied */
export interface ResolvedTransactionOptions {
  retry: boolean;
  classifyError: ErrorClassifier;
  quoter: SqlQuoter;
  generateSavepointId: () => string;
  /** The BEGIN command implied by `isolation` and `deferrable` */
  beginStatement: string;
}
