export type { BarrierOutcome } from './completion-barrier.js';
export { CompletionBarrier } from './completion-barrier.js';
