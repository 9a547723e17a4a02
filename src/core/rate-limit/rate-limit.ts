/**
 * Actuator rate limits
 *
 * Activations (`on`, `pulse`) are checked against:
 * - **min interval**: rest since the last activation ended
 * - **max runtime**: runtime budget inside the rolling window
 *
 * Turning an actuator off is never limited.
 */

import type { RateLimitCheckResult, RateLimitConfig, RateLimitRecord } from './types';
import { RATE_LIMITS } from './types';
import { pruneRuntimeLog, runtimeInWindow } from './helpers';

/**
 * Create an empty activation history
 * @returns Record for an actuator that has never run
 */
export function createRateLimitRecord(): RateLimitRecord {
  return {
    lastActivationStart: null,
    lastActivationEnd: null,
    on: false,
    onSince: null,
    runtimeLog: []
  };
}

/**
 * Check the minimum rest between activations
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param minIntervalMs - Required rest (ms)
 * @returns Result with allow flag and when the actuator may start again
 */
export function checkMinInterval(record: RateLimitRecord, now: number, minIntervalMs: number): RateLimitCheckResult {
  if (record.lastActivationEnd === null) {
    return { allow: true };
  }

  const rested = now - record.lastActivationEnd;
  if (rested >= minIntervalMs) {
    return { allow: true };
  }

  return {
    allow: false,
    remainingMs: minIntervalMs - rested,
    canActivateAt: record.lastActivationEnd + minIntervalMs,
    reason: RATE_LIMITS.MIN_INTERVAL
  };
}

/**
 * Check the runtime budget of the rolling window
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param config - Actuator limits
 * @returns Result with allow flag
 */
export function checkMaxRuntime(record: RateLimitRecord, now: number, config: RateLimitConfig): RateLimitCheckResult {
  if (runtimeInWindow(record, now, config.runtimeWindowMs) >= config.maxRuntimeMs) {
    return { allow: false, reason: RATE_LIMITS.MAX_RUNTIME };
  }
  return { allow: true };
}

/**
 * Apply both activation limits
 *
 * Main entry point for the controller; min interval is reported first.
 *
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param config - Actuator limits
 * @returns Final allow decision
 */
export function checkActivation(record: RateLimitRecord, now: number, config: RateLimitConfig): RateLimitCheckResult {
  const interval = checkMinInterval(record, now, config.minIntervalMs);
  if (!interval.allow) {
    return interval;
  }
  return checkMaxRuntime(record, now, config);
}

/**
 * Runtime still available in the window
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param config - Actuator limits
 * @returns Remaining budget in ms (never negative)
 */
export function remainingBudgetMs(record: RateLimitRecord, now: number, config: RateLimitConfig): number {
  return Math.max(0, config.maxRuntimeMs - runtimeInWindow(record, now, config.runtimeWindowMs));
}

/**
 * Record the start of an activation (mutates record)
 */
export function recordActivation(record: RateLimitRecord, now: number): void {
  record.on = true;
  record.onSince = now;
  record.lastActivationStart = now;
}

/**
 * Record the end of an activation (mutates record)
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param windowMs - Window length used to prune old spans
 */
export function recordDeactivation(record: RateLimitRecord, now: number, windowMs: number): void {
  if (record.on && record.onSince !== null) {
    record.runtimeLog.push({ start: record.onSince, end: now });
    record.lastActivationEnd = now;
  }
  record.on = false;
  record.onSince = null;
  pruneRuntimeLog(record, now, windowMs);
}

/**
 * Check whether a running actuator has hit its continuous-on or window limit
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param config - Actuator limits
 * @returns Blocking constraint, or null while the actuator may keep running
 */
export function exceededOnLimit(record: RateLimitRecord, now: number, config: RateLimitConfig): 'max_on' | 'max_runtime' | null {
  if (!record.on || record.onSince === null) {
    return null;
  }
  if (now - record.onSince >= config.maxOnMs) {
    return 'max_on';
  }
  if (runtimeInWindow(record, now, config.runtimeWindowMs) >= config.maxRuntimeMs) {
    return 'max_runtime';
  }
  return null;
}
