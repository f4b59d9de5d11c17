/**
 * Completion Barrier
 *
 * Aggregates an open-ended set of pending futures and settles once, after it
 * has been closed and every tracked future has finished.
 *
 * @module barrier/completion-barrier
 */

import { BarrierClosedError, normalizeError } from '../errors.js';

/**
 * Terminal outcome of a barrier
 *
 * `Failed` carries the first failure recorded; later ones are discarded.
 */
export type BarrierOutcome = { readonly _tag: 'Succeeded' } | { readonly _tag: 'Failed'; readonly error: Error };

/**
 * Completion barrier over a set of futures
 *
 * Futures are added one at a time as a scope issues commands, so an empty
 * outstanding set on its own does not mean the scope is done: the barrier only
 * settles after an explicit `close()`. Forgetting to close a barrier leaves
 * `settled` pending forever.
 *
 * @example
 * ```typescript
 * const barrier = new CompletionBarrier();
 * barrier.add(conn.execute('INSERT ...', []));
 * barrier.add(conn.execute('UPDATE ...', []));
 * barrier.close();
 *
 * const outcome = await barrier.settled;
 * if (outcome._tag === 'Failed') {
 *   console.error(outcome.error);
 * }
 * ```
 */
export class CompletionBarrier {
  /** Resolves exactly once with the barrier's outcome; never rejects */
  readonly settled: Promise<BarrierOutcome>;

  private readonly pending = new Set<Promise<unknown>>();
  private closed = false;
  private terminated = false;
  private failure: Error | undefined;
  private resolveSettled: (outcome: BarrierOutcome) => void = () => undefined;

  constructor() {
    this.settled = new Promise<BarrierOutcome>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isSettled(): boolean {
    return this.terminated;
  }

  /** Number of tracked futures that have not finished yet */
  get outstanding(): number {
    return this.pending.size;
  }

  /**
   * Tracks a future until it finishes
   *
   * @returns The same future, so callers can keep chaining on it
   * @throws {BarrierClosedError} If the barrier has been closed
   */
  add<T>(future: Promise<T>): Promise<T> {
    if (this.closed) {
      throw new BarrierClosedError();
    }

    this.pending.add(future);
    void future.then(
      () => this.completed(future),
      (error: unknown) => {
        this.fail(error);
        this.completed(future);
      },
    );
    return future;
  }

  /**
   * Records a failure without tracking a future
   *
   * Only the first failure is kept. Has no effect once the barrier has settled.
   */
  fail(error: unknown): void {
    if (this.terminated || this.failure) {
      return;
    }
    this.failure = normalizeError(error);
  }

  /**
   * Declares that no more futures will be added
   *
   * @throws {BarrierClosedError} If the barrier is already closed
   */
  close(): void {
    if (this.closed) {
      throw new BarrierClosedError('This completion barrier has already been closed');
    }
    this.closed = true;
    this.maybeSettle();
  }

  private completed(future: Promise<unknown>): void {
    this.pending.delete(future);
    this.maybeSettle();
  }

  private maybeSettle(): void {
    if (!this.closed || this.pending.size > 0 || this.terminated) {
      return;
    }
    this.terminated = true;
    this.resolveSettled(this.failure ? { _tag: 'Failed', error: this.failure } : { _tag: 'Succeeded' });
  }
}
