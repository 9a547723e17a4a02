/**
 * Loop state management
 */

import type { LoopState } from './types';

export * from './types';

/**
 * Create the loop state for a fresh start
 * @param nowMs - Start time (ms)
 * @returns Loop state with zeroed counters
 */
export function createInitialLoopState(nowMs: number): LoopState {
  return {
    startTime: nowMs,
    lastTickAt: null,
    lastTickDurationMs: 0,

    tickCount: 0,
    skippedTicks: 0,

    consecutiveErrors: 0,
    lastErrorTime: null,
    lastError: null
  };
}

/**
 * Record a failed tick (mutates state)
 * @returns Consecutive failures including this one
 */
export function recordTickError(state: LoopState, nowMs: number, message: string): number {
  state.consecutiveErrors++;
  state.lastErrorTime = nowMs;
  state.lastError = message;
  return state.consecutiveErrors;
}
