/**
 * Rate limit helper functions
 * Runtime accounting over the rolling window
 */

import type { ActuatorSpec } from '$types';
import { TIME_CONSTANTS } from '@utils/constants';
import type { RateLimitConfig, RateLimitRecord, RuntimeSpan } from './types';

/**
 * Convert a registry entry into millisecond limits
 * @param spec - Actuator registry entry
 * @returns Limits in ms
 */
export function toRateLimitConfig(spec: ActuatorSpec): RateLimitConfig {
  return {
    minIntervalMs: spec.minIntervalSec * TIME_CONSTANTS.MS_PER_SECOND,
    maxRuntimeMs: spec.maxRuntimeSec * TIME_CONSTANTS.MS_PER_SECOND,
    runtimeWindowMs: spec.runtimeWindowSec * TIME_CONSTANTS.MS_PER_SECOND,
    maxOnMs: spec.maxOnSec * TIME_CONSTANTS.MS_PER_SECOND
  };
}

/**
 * Portion of a span inside [windowStart, now]
 * @internal
 */
export function overlapMs(span: RuntimeSpan, windowStart: number, now: number): number {
  const start = Math.max(span.start, windowStart);
  const end = Math.min(span.end, now);
  return end > start ? end - start : 0;
}

/**
 * Runtime accumulated inside the rolling window, including the current activation
 * @param record - Activation history
 * @param now - Current time (ms)
 * @param windowMs - Window length (ms)
 * @returns Runtime in ms
 */
export function runtimeInWindow(record: RateLimitRecord, now: number, windowMs: number): number {
  const windowStart = now - windowMs;
  let total = 0;
  for (let i = 0; i < record.runtimeLog.length; i++) {
    total += overlapMs(record.runtimeLog[i], windowStart, now);
  }
  if (record.on && record.onSince !== null) {
    total += overlapMs({ start: record.onSince, end: now }, windowStart, now);
  }
  return total;
}

/**
 * Drop spans that ended before the window started
 * @param record - Activation history (mutated)
 * @param now - Current time (ms)
 * @param windowMs - Window length (ms)
 */
export function pruneRuntimeLog(record: RateLimitRecord, now: number, windowMs: number): void {
  const windowStart = now - windowMs;
  record.runtimeLog = record.runtimeLog.filter(function(span) {
    return span.end > windowStart;
  });
}
