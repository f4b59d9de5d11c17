/**
 * Debug logging for the node-postgres adapter
 *
 * @example
 * ```bash
 * DEBUG=pg-txn:pg node app.js
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for client acquisition and release
 */
export const pgLog: Debugger = debug('pg-txn:pg');
