/**
 * Actuator rate limit type definitions
 *
 * Minimum rest between activations and a runtime budget over a rolling
 * window protect pumps and lamps from short-cycling and dry running.
 */

/**
 * Constraint identifiers (match the controller's reject reasons)
 */
export const RATE_LIMITS = {
  MIN_INTERVAL: 'min_interval',
  MAX_RUNTIME: 'max_runtime'
} as const;

export type RateLimitType = typeof RATE_LIMITS[keyof typeof RATE_LIMITS];

/**
 * Result of a rate limit check
 */
export interface RateLimitCheckResult {
  /** Whether an activation is allowed now */
  allow: boolean;

  /** Milliseconds until the blocking constraint clears (min interval only) */
  remainingMs?: number;

  /** Timestamp when the actuator may be activated again (min interval only) */
  canActivateAt?: number;

  /** Which constraint is blocking */
  reason?: RateLimitType;
}

/**
 * One finished activation
 */
export interface RuntimeSpan {
  start: number;
  end: number;
}

/**
 * Activation history of one actuator (mutated in place)
 */
export interface RateLimitRecord {
  lastActivationStart: number | null;
  lastActivationEnd: number | null;
  on: boolean;
  /** Start of the current activation while on */
  onSince: number | null;
  /** Finished activations that still overlap the runtime window */
  runtimeLog: RuntimeSpan[];
}

/**
 * Limits in milliseconds, derived from the actuator registry entry
 */
export interface RateLimitConfig {
  minIntervalMs: number;
  maxRuntimeMs: number;
  runtimeWindowMs: number;
  maxOnMs: number;
}
