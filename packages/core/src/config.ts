/**
 * Transaction option validation
 *
 * Options are validated before any command is sent, so a bad isolation level
 * never reaches the server.
 *
 * @module config
 */

import { createId } from '@paralleldrive/cuid2';
import type { ResolvedTransactionOptions, TransactionOptions } from './config.types.js';
import { DEFAULTS, ISOLATION_LEVELS, type IsolationLevel } from './constants.js';
import { ConfigurationError } from './errors.js';
import { postgresQuoter } from './sql/index.js';
import { classifyBySqlState } from './utils/error-classifier.js';

const isIsolationLevel = (value: string): value is IsolationLevel => Object.hasOwn(ISOLATION_LEVELS, value);

/**
 * Validates an isolation level coming from untyped input
 *
 * @throws {ConfigurationError} If the value is not a known isolation level
 */
export const parseIsolationLevel = (value: unknown): IsolationLevel => {
  if (typeof value === 'string' && isIsolationLevel(value)) {
    return value;
  }
  throw new ConfigurationError(
    'isolation',
    `unknown isolation level ${JSON.stringify(value)}. Expected one of: ${Object.keys(ISOLATION_LEVELS).join(', ')}`,
  );
};

/**
 * Builds the BEGIN command for a set of options
 *
 * @example
 * ```typescript
 * beginStatement({ isolation: 'serializable', deferrable: true });
 * // => 'BEGIN TRANSACTION ISOLATION LEVEL SERIALIZABLE DEFERRABLE'
 * ```
 */
export const beginStatement = (options: Pick<TransactionOptions, 'isolation' | 'deferrable'>): string => {
  let sql = 'BEGIN';
  if (options.isolation !== undefined) {
    sql += ` TRANSACTION ISOLATION LEVEL ${ISOLATION_LEVELS[parseIsolationLevel(options.isolation)]}`;
  }
  if (options.deferrable ?? DEFAULTS.DEFERRABLE) {
    sql += ' DEFERRABLE';
  }
  return sql;
};

/**
 * Applies defaults and validates transaction options
 *
 * @throws {ConfigurationError} If the isolation level is unknown
 */
export const resolveTransactionOptions = (options: TransactionOptions = {}): ResolvedTransactionOptions => {
  return {
    retry: options.retry ?? DEFAULTS.RETRY,
    classifyError: options.classifyError ?? classifyBySqlState,
    quoter: options.quoter ?? postgresQuoter,
    generateSavepointId: options.generateSavepointId ?? createId,
    beginStatement: beginStatement(options),
  };
};

const readBoolean = (raw: Record<string, unknown>, key: 'deferrable' | 'retry'): boolean | undefined => {
  const value = raw[key];
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new ConfigurationError(key, `expected a boolean, received ${JSON.stringify(value)}`);
};

/**
 * Validates transaction options from untyped input such as parsed JSON
 *
 * Only the serialisable options (`isolation`, `deferrable`, `retry`) are read.
 *
 * @throws {ConfigurationError} If the input is not an object or holds invalid values
 *
 * @example
 * ```typescript
 * const options = parseTransactionOptions(JSON.parse(fs.readFileSync('txn.json', 'utf8')));
 * ```
 */
export const parseTransactionOptions = (raw: unknown): TransactionOptions => {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError('options', `expected an object, received ${JSON.stringify(raw)}`);
  }
  const record: Record<string, unknown> = { ...raw };

  const options: TransactionOptions = {};
  if (record.isolation !== undefined) {
    options.isolation = parseIsolationLevel(record.isolation);
  }
  const deferrable = readBoolean(record, 'deferrable');
  if (deferrable !== undefined) {
    options.deferrable = deferrable;
  }
  const retry = readBoolean(record, 'retry');
  if (retry !== undefined) {
    options.retry = retry;
  }
  return options;
};
