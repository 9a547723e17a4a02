/**
 * Type definition for the grow controller configuration
 */

import type { LogLevel, LogLevels } from '@logging/types';
import type { SensorKind } from './common';

// ═══════════════════════════════════════════════════════════════
// DEVICE REGISTRY
// ═══════════════════════════════════════════════════════════════

/**
 * Registered sensor and its plausible range
 * Readings outside [min, max] are treated as sensor faults.
 */
export interface SensorSpec {
  readonly id: string;
  readonly kind: SensorKind;
  /** Canonical unit after normalisation ('C', '%', 'lux') */
  readonly unit: string;
  readonly min: number;
  readonly max: number;
}

/**
 * Registered actuator and its protection limits
 */
export interface ActuatorSpec {
  readonly id: string;
  /** Minimum rest between the end of one activation and the start of the next */
  readonly minIntervalSec: number;
  /** Runtime budget inside the rolling window */
  readonly maxRuntimeSec: number;
  /** Rolling window length for maxRuntimeSec */
  readonly runtimeWindowSec: number;
  /** Longest single pulse; longer requests are clamped */
  readonly maxPulseSec: number;
  /** Longest continuous "on" before the controller cuts it */
  readonly maxOnSec: number;
}

// ═══════════════════════════════════════════════════════════════
// AUTOMATION RULES
// ═══════════════════════════════════════════════════════════════

/**
 * What a rule does while it is engaged
 */
export type RuleActionSpec =
  | { readonly type: 'on' }
  | { readonly type: 'pulse'; readonly durationSec: number };

/**
 * Threshold rule with hysteresis
 *
 * direction 'above': engage when the reading rises to onAt, release when it falls to offAt (offAt < onAt)
 * direction 'below': engage when the reading falls to onAt, release when it rises to offAt (offAt > onAt)
 */
export interface ThresholdRuleSpec {
  readonly id: string;
  readonly type: 'threshold';
  readonly actuatorId: string;
  readonly sensorId: string;
  readonly direction: 'above' | 'below';
  readonly onAt: number;
  readonly offAt: number;
  readonly action: RuleActionSpec;
  readonly cooldownSec: number;
}

/**
 * Time-of-day rule: actuator on inside [from, to), off outside
 * Times are local "HH:MM"; a window may wrap midnight.
 */
export interface TimeWindowRuleSpec {
  readonly id: string;
  readonly type: 'time_window';
  readonly actuatorId: string;
  readonly from: string;
  readonly to: string;
  readonly cooldownSec: number;
}

export type RuleSpec = ThresholdRuleSpec | TimeWindowRuleSpec;

// ═══════════════════════════════════════════════════════════════
// HUMAN INTERACTION
// ═══════════════════════════════════════════════════════════════

/**
 * Action a person can request
 */
export type HumanActionSpec =
  | { readonly type: 'on' }
  | { readonly type: 'off' }
  | { readonly type: 'pulse'; readonly durationSec: number };

/**
 * Physical button available during a session
 */
export interface ButtonSpec {
  readonly id: string;
  /** Activity kind recorded in the session log */
  readonly activity: string;
  /** Optional actuator command the press requests */
  readonly command?: {
    readonly actuatorId: string;
    readonly action: HumanActionSpec;
  };
}

// ═══════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for a growing environment
 */
export interface GrowUserConfig {
  // ───────── LOOP TIMING ─────────
  readonly TICK_PERIOD_MS: number;
  readonly SAMPLE_PERIOD_SEC: number;

  // ───────── I/O BOUNDS ─────────
  readonly SENSOR_TIMEOUT_MS: number;
  readonly ACTUATOR_TIMEOUT_MS: number;
  readonly INPUT_TIMEOUT_MS: number;

  // ───────── SENSOR HEALTH ─────────
  readonly SENSOR_DEGRADED_AFTER: number;

  // ───────── SESSIONS & INPUTS ─────────
  readonly SESSION_GRACE_SEC: number;
  readonly DEFAULT_PARTICIPANT: string;
  readonly INPUT_DEBOUNCE_MS: number;
  readonly INPUT_QUEUE_SIZE: number;

  // ───────── EVENT SINK ─────────
  readonly EVENT_QUEUE_SIZE: number;
  readonly EVENT_DRAIN_INTERVAL_MS: number;
  readonly EVENT_LOG_PATH: string;

  // ───────── DEVICE REGISTRY & RULES ─────────
  readonly SENSORS: readonly SensorSpec[];
  readonly ACTUATORS: readonly ActuatorSpec[];
  readonly RULES: readonly RuleSpec[];
  readonly BUTTONS: readonly ButtonSpec[];

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_LOG_LEVEL: LogLevel;
  readonly SLACK_WEBHOOK_URL: string;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface GrowAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── APPLICATION CONSTANTS ─────────
  readonly MAX_CONSECUTIVE_ERRORS: number;
  readonly SLACK_MAX_RETRIES: number;
  readonly SLACK_MAX_RETRY_DELAY_MS: number;

  // ───────── VALIDATION CONSTANTS ─────────
  readonly MAX_TICK_PERIOD_MS: number;
  readonly MIN_TICK_PERIOD_MS: number;
  readonly MIN_SAMPLE_PERIOD_SEC: number;
  readonly MAX_SAMPLE_PERIOD_SEC: number;
}

/**
 * Complete grow controller configuration
 */
export type GrowConfig = GrowUserConfig & GrowAppConstants;
