/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all transaction logs
 * DEBUG=pg-txn:* node app.js
 *
 * # Trace every command sent to the connection
 * DEBUG=pg-txn:query npm test
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for commands submitted to the connection
 */
export const queryLog: Debugger = debug('pg-txn:query');

/**
 * Debug logger for transaction lifecycle (BEGIN, COMMIT, ROLLBACK)
 */
export const txnLog: Debugger = debug('pg-txn:txn');

/**
 * Debug logger for savepoint scopes
 */
export const savepointLog: Debugger = debug('pg-txn:savepoint');

/**
 * Debug logger for upsert and serialization-failure retries
 */
export const retryLog: Debugger = debug('pg-txn:retry');
