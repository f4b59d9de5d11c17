/**
 * Transaction Coordinator
 *
 * Runs the commands of one transaction over a single connection, tracking the
 * outstanding commands of every scope (the transaction itself and each nested
 * savepoint) with a completion barrier.
 *
 * @module transaction/transaction
 */

import type { Compilable } from 'kysely';
import { CompletionBarrier } from '../barrier/index.js';
import type { ResolvedTransactionOptions } from '../config.types.js';
import { DEFAULTS } from '../constants.js';
import { normalizeError, RollbackRequestedError, TransactionClosedError } from '../errors.js';
import type { Connection, ResultSet, Row, SqlCommand } from '../interfaces/index.js';
import { insertSql, quoteIdentifier, type SqlValue, toSqlCommand, upsertSql } from '../sql/index.js';
import { queryLog, retryLog, savepointLog, txnLog } from '../utils/debug.js';
import {
  planBulkInsert,
  UNIQUE_INDEX_QUERY,
  uniqueConstraintsFromCatalog,
  validateBulkRows,
} from './bulk-insert.js';
import type { RootScope, SavepointScope, Scope } from './scope.js';

/**
 * Transaction lifecycle
 *
 * `finishing` starts as soon as COMMIT or ROLLBACK has been issued.
 */
export type TransactionStatus = 'opening' | 'active' | 'finishing' | 'committed' | 'rolled-back';

/** Application code run inside a transaction */
export type TransactionBody = (txn: Transaction) => Promise<void> | void;

/** Application code run inside a savepoint */
export type SavepointBody<T> = (txn: Transaction) => Promise<T> | T;

type BodyResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: Error };

/**
 * A transaction on an exclusively held connection
 *
 * Every command is sent as soon as it is issued. To keep the wire order equal
 * to program order, await each command before issuing the next one; commands
 * issued without waiting are sent in call order, whatever order was intended.
 *
 * A failed command rolls back the scope it was issued in (see
 * {@link Transaction.autoRollbackOnError}). Inside a savepoint that means
 * `ROLLBACK TO` and a rejected `savepoint()` promise, leaving the enclosing
 * scope usable.
 *
 * @example
 * ```typescript
 * await runTransaction(conn, {}, async (txn) => {
 *   await txn.insert('foo', { bar: 'wombat' });
 *   try {
 *     await txn.savepoint(async () => {
 *       await txn.insert('foo', { bar: 'baz' });
 *     });
 *   } catch {
 *     await txn.insert('foo', { bar: 'wibble' });
 *   }
 *   await txn.commit();
 * });
 * ```
 */
export class Transaction {
  /**
   * Roll back the current scope when one of its commands fails
   *
   * When disabled, failures are still recorded and the transaction still
   * rejects, but no ROLLBACK is issued on the caller's behalf.
   *
   * @default true
   */
  autoRollbackOnError: boolean = DEFAULTS.AUTO_ROLLBACK_ON_ERROR;

  private currentStatus: TransactionStatus = 'opening';
  private readonly root: RootScope = { kind: 'transaction', barrier: new CompletionBarrier() };
  private readonly savepoints: SavepointScope[] = [];
  private rollingBack: Promise<void> | undefined;
  private abandonedError: Error | undefined;

  constructor(
    private readonly conn: Connection,
    private readonly options: ResolvedTransactionOptions,
  ) {}

  get status(): TransactionStatus {
    return this.currentStatus;
  }

  /** True once COMMIT or ROLLBACK has been issued */
  get finished(): boolean {
    return this.currentStatus !== 'opening' && this.currentStatus !== 'active';
  }

  /** Number of savepoints currently open */
  get savepointDepth(): number {
    return this.savepoints.length;
  }

  private get currentScope(): Scope {
    return this.savepoints[this.savepoints.length - 1] ?? this.root;
  }

  /**
   * Opens the transaction, runs `body` and settles once the transaction has ended
   *
   * A body that completes without committing or rolling back is committed.
   * A body that throws rolls the transaction back with the thrown error.
   *
   * @returns Resolves after COMMIT; rejects with the first failure otherwise
   */
  async run(body: TransactionBody): Promise<void> {
    txnLog('%s', this.options.beginStatement);
    const opened = await this.track(this.root, this.send(this.options.beginStatement, []), true).then(
      () => true,
      // BEGIN's failure is recorded by the root barrier and has already triggered ROLLBACK.
      () => false,
    );

    if (opened && this.currentStatus === 'opening') {
      this.currentStatus = 'active';
      await this.invoke(body);
    }

    const outcome = await this.root.barrier.settled;
    if (outcome._tag === 'Failed') {
      throw outcome.error;
    }
    if (this.abandonedError) {
      throw this.abandonedError;
    }
  }

  /**
   * Executes a command in the current scope
   *
   * @returns The command's own future, for sequencing the next step
   * @throws {TransactionClosedError} If the transaction or current savepoint has finished
   */
  exec(sql: string, params: readonly unknown[] = []): Promise<ResultSet> {
    const scope = this.writableScope();
    return this.track(scope, this.send(sql, params), true);
  }

  /**
   * Inserts one row, using the keys of `fields` as column names
   *
   * @throws {TransactionClosedError} If the transaction or current savepoint has finished
   */
  insert(table: string, fields: Record<string, unknown>): Promise<ResultSet> {
    const { sql, params } = insertSql(table, fields);
    return this.exec(sql, params);
  }

  /**
   * Executes a query built with Kysely
   *
   * @example
   * ```typescript
   * await txn.execQuery(db.selectFrom('foo').selectAll());
   * ```
   */
  execQuery(query: Compilable): Promise<ResultSet> {
    const { sql, params }: SqlCommand = toSqlCommand(query);
    return this.exec(sql, params);
  }

  /**
   * Updates the row matching `keyFields`, or inserts `fields` when none matches
   *
   * A unique violation on the first attempt (a concurrent insert of the same
   * key) is retried once with the same statement; any other failure, or a
   * second failure of any kind, is final.
   *
   * @returns The updated or inserted row
   * @throws {InvalidArgumentError} If a key field is missing from `fields`
   */
  upsert(table: string, keyFields: string | readonly string[], fields: Record<string, unknown>): Promise<Row | undefined> {
    const { sql, params } = upsertSql(table, keyFields, fields);
    const scope = this.writableScope();

    const attempt = this.send(sql, params).catch((error: unknown) => {
      if (this.options.classifyError(error) !== 'unique-violation') {
        throw error;
      }
      retryLog('upsert into %s hit a unique violation, retrying once', table);
      return this.send(sql, params);
    });

    const row = this.track(scope, attempt, true).then((result) => result.rows[0]);
    // The failure is already recorded by the barrier; callers may not await.
    void row.catch(() => undefined);
    return row;
  }

  /**
   * Inserts many rows in one statement, skipping rows that collide with a unique index
   *
   * @returns Number of rows inserted, which may be lower than `rows.length`
   * @throws {InvalidArgumentError} If a unique index column is not among `columns`; the scope is rolled back
   */
  async bulkInsert(table: string, columns: readonly string[], rows: readonly (readonly SqlValue[])[]): Promise<number> {
    const scope = this.writableScope();
    if (rows.length === 0) {
      return 0;
    }
    validateBulkRows(table, columns, rows);

    const catalog = await this.exec(UNIQUE_INDEX_QUERY, [this.options.quoter.quoteIdentifier(table)]);
    const constraints = uniqueConstraintsFromCatalog(catalog.rows);

    let command: SqlCommand;
    try {
      command = planBulkInsert({ table, columns, rows, constraints, quoter: this.options.quoter });
    } catch (error) {
      if (this.autoRollbackOnError) {
        this.rollbackScope(scope, error);
      }
      throw error;
    }

    const result = await this.exec(command.sql, command.params);
    return result.rowCount;
  }

  /**
   * Runs `body` inside a savepoint
   *
   * If `body` throws, or a command issued in the savepoint fails, the
   * database is rolled back to the savepoint and the returned promise
   * rejects; the enclosing scope is current again by then, so a `catch` can
   * carry on with an alternative.
   *
   * @returns The value returned by `body`, once every command of the savepoint has completed
   */
  async savepoint<T>(body: SavepointBody<T>): Promise<T> {
    const host = this.writableScope();
    const id = this.options.generateSavepointId();
    await this.track(host, this.send(`SAVEPOINT ${quoteIdentifier(id)}`, []), true);

    const scope: SavepointScope = { kind: 'savepoint', id, barrier: new CompletionBarrier(), state: 'active' };
    this.savepoints.push(scope);
    savepointLog('entered %s (depth %d)', id, this.savepoints.length);

    let result: BodyResult<T>;
    try {
      result = { ok: true, value: await body(this) };
    } catch (error) {
      result = { ok: false, error: normalizeError(error) };
      this.rollbackScope(scope, error);
    }

    if (!scope.barrier.isClosed) {
      scope.barrier.close();
    }
    const outcome = await scope.barrier.settled;
    if (outcome._tag === 'Failed' && scope.state === 'active') {
      // A failure the body swallowed, with auto-rollback off.
      this.rollbackSavepoint(scope, outcome.error);
    }
    await scope.rollback;
    this.unwind(scope);

    if (outcome._tag === 'Failed') {
      throw outcome.error;
    }
    if (!result.ok) {
      throw result.error;
    }
    savepointLog('released %s', id);
    return result.value;
  }

  /**
   * Commits the transaction
   *
   * Does nothing if the transaction has already finished. A failed COMMIT is
   * not followed by ROLLBACK: the server has already ended the transaction.
   */
  commit(): Promise<void> {
    if (this.finished) {
      return Promise.resolve();
    }
    this.currentStatus = 'finishing';
    txnLog('COMMIT');

    const committed = this.track(this.root, this.send('COMMIT', []), false).then(
      () => {
        this.currentStatus = 'committed';
        this.root.barrier.close();
      },
      (error: unknown) => {
        txnLog('COMMIT failed: %O', error);
        this.currentStatus = 'rolled-back';
        this.root.barrier.close();
        throw error;
      },
    );
    // The failure is already recorded by the barrier; callers may not await.
    void committed.catch(() => undefined);
    return committed;
  }

  /**
   * Rolls back the current scope
   *
   * Inside a savepoint this issues `ROLLBACK TO` and makes the savepoint
   * reject with `cause`; otherwise it issues ROLLBACK and the transaction
   * rejects with `cause`. Does nothing if the scope has already finished.
   */
  rollback(cause: unknown = new RollbackRequestedError()): Promise<void> {
    const scope = this.currentScope;
    this.rollbackScope(scope, cause);
    const pending = scope.kind === 'savepoint' ? scope.rollback : this.rollingBack;
    return pending ?? Promise.resolve();
  }

  private async invoke(body: TransactionBody): Promise<void> {
    try {
      await body(this);
    } catch (error) {
      if (this.finished) {
        txnLog('body failed after the transaction finished: %O', error);
        this.abandonedError ??= normalizeError(error);
      } else {
        this.rollbackScope(this.root, error);
      }
      return;
    }

    if (!this.finished) {
      // Falling off the end of the body commits; a failure is recorded by the root barrier.
      await this.commit().catch((error: unknown) => txnLog('implicit COMMIT failed: %O', error));
    }
  }

  private send(sql: string, params: readonly unknown[]): Promise<ResultSet> {
    queryLog('%s %o', sql, params);
    return this.conn.execute(sql, params);
  }

  private track<T>(scope: Scope, future: Promise<T>, rollbackOnError: boolean): Promise<T> {
    scope.barrier.add(future);
    if (rollbackOnError) {
      void future.then(undefined, (error: unknown) => {
        if (this.autoRollbackOnError) {
          this.rollbackScope(scope, error);
        }
      });
    }
    return future;
  }

  private writableScope(): Scope {
    const scope = this.currentScope;
    if (this.currentStatus !== 'active') {
      throw new TransactionClosedError();
    }
    if (scope.kind === 'savepoint' && (scope.state !== 'active' || scope.barrier.isClosed)) {
      throw new TransactionClosedError(`Cannot execute a command in savepoint "${scope.id}" after it has ended`);
    }
    return scope;
  }

  private rollbackScope(scope: Scope, cause: unknown): void {
    if (scope.kind === 'savepoint') {
      this.rollbackSavepoint(scope, cause);
    } else {
      this.rollbackTransaction(cause);
    }
  }

  private rollbackTransaction(cause: unknown): void {
    if (this.finished) {
      return;
    }
    this.currentStatus = 'finishing';
    txnLog('ROLLBACK (%s)', normalizeError(cause).message);

    for (const scope of this.savepoints) {
      this.abandon(scope, cause);
    }
    this.root.barrier.fail(cause);

    const finalize = (): void => {
      this.currentStatus = 'rolled-back';
      this.savepoints.length = 0;
      this.root.barrier.close();
    };
    this.rollingBack = this.track(this.root, this.send('ROLLBACK', []), false).then(finalize, (error: unknown) => {
      txnLog('ROLLBACK failed: %O', error);
      finalize();
    });
  }

  private rollbackSavepoint(scope: SavepointScope, cause: unknown): void {
    if (scope.state !== 'active') {
      return;
    }
    if (this.finished) {
      this.abandon(scope, cause);
      return;
    }
    scope.state = 'finishing';
    savepointLog('ROLLBACK TO %s (%s)', scope.id, normalizeError(cause).message);

    const index = this.savepoints.indexOf(scope);
    for (const inner of this.savepoints.slice(index + 1)) {
      this.abandon(inner, cause);
    }
    scope.barrier.fail(cause);

    // The scope stays on the stack, closed, until savepoint() returns.
    const finish = (): void => {
      scope.state = 'finished';
    };
    const command = this.send(`ROLLBACK TO ${quoteIdentifier(scope.id)}`, []);
    scope.rollback = this.track(this.hostOf(index), command, true).then(finish, finish);

    if (!scope.barrier.isClosed) {
      scope.barrier.close();
    }
  }

  /** Ends a savepoint whose enclosing scope is going away with it */
  private abandon(scope: SavepointScope, cause: unknown): void {
    if (scope.state !== 'active') {
      return;
    }
    scope.state = 'finished';
    scope.barrier.fail(cause);
    if (!scope.barrier.isClosed) {
      scope.barrier.close();
    }
  }

  /** Nearest enclosing scope still accepting commands, for the savepoint at `index` */
  private hostOf(index: number): Scope {
    for (let i = index - 1; i >= 0; i--) {
      const candidate = this.savepoints[i];
      if (candidate && !candidate.barrier.isClosed) {
        return candidate;
      }
    }
    return this.root;
  }

  /** Pops `scope` (and anything still above it) so its parent is current again */
  private unwind(scope: SavepointScope): void {
    scope.state = 'finished';
    const index = this.savepoints.indexOf(scope);
    if (index >= 0) {
      this.savepoints.splice(index);
    }
  }
}
