/**
 * Control loop runtime state
 */

export interface LoopState {
  // ═══════════════════════════════════════════════════════════════
  // TIMING
  // ═══════════════════════════════════════════════════════════════
  startTime: number;
  lastTickAt: number | null;
  /** Duration of the last completed tick (ms) */
  lastTickDurationMs: number;

  // ═══════════════════════════════════════════════════════════════
  // COUNTERS
  // ═══════════════════════════════════════════════════════════════
  tickCount: number;
  /** Ticks skipped because the previous one was still running */
  skippedTicks: number;

  // ═══════════════════════════════════════════════════════════════
  // ERROR TRACKING
  // ═══════════════════════════════════════════════════════════════
  consecutiveErrors: number;
  lastErrorTime: number | null;
  lastError: string | null;
}
