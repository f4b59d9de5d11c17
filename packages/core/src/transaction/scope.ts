import type { CompletionBarrier } from '../barrier/index.js';

/** Lifecycle of a savepoint scope */
export type ScopeState = 'active' | 'finishing' | 'finished';

/** The outermost scope, bounded by BEGIN and COMMIT/ROLLBACK */
export interface RootScope {
  readonly kind: 'transaction';
  readonly barrier: CompletionBarrier;
}

/** A nested scope, bounded by SAVEPOINT and an optional ROLLBACK TO */
export interface SavepointScope {
  readonly kind: 'savepoint';
  readonly id: string;
  readonly barrier: CompletionBarrier;
  state: ScopeState;
  /** Set once ROLLBACK TO has been issued; settles once ROLLBACK TO has completed */
  rollback?: Promise<void>;
}

export type Scope = RootScope | SavepointScope;
