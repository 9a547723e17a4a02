/**
 * Event and command types shared by the control components
 *
 * Every value crossing a component boundary is defined here and treated as
 * immutable once produced. The same shapes are what the event sink records.
 */

import type { EpochMs, SensorKind } from '$types';

// ═══════════════════════════════════════════════════════════════
// READINGS
// ═══════════════════════════════════════════════════════════════

/**
 * Normalised sensor reading
 * Invalid readings are recorded but never drive automation.
 */
export interface SensorReading {
  readonly sourceId: string;
  readonly kind: SensorKind;
  /** Normalised value; null when the read produced no number */
  readonly value: number | null;
  readonly unit: string;
  readonly timestamp: EpochMs;
  readonly valid: boolean;
  /** Why the reading is invalid */
  readonly error?: string;
}

// ═══════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════

export type ActuatorAction =
  | { readonly type: 'on' }
  | { readonly type: 'off' }
  | { readonly type: 'pulse'; readonly durationMs: number };

export type CommandOrigin = 'scheduler' | 'human' | 'safety';

/**
 * Arbitration rank per origin (higher wins)
 */
export const ORIGIN_PRIORITY = {
  scheduler: 1,
  human: 2,
  safety: 3
} as const;

/**
 * Request to change one actuator
 */
export interface ActuatorCommand {
  readonly actuatorId: string;
  readonly action: ActuatorAction;
  readonly origin: CommandOrigin;
  readonly issuedAt: EpochMs;
  /** Why the command was issued ("rule fan-heat engaged", "emergency stop") */
  readonly reason?: string;
  /** Rule id, button id or input that produced it */
  readonly source?: string;
}

export type CommandStatus = 'executed' | 'unchanged' | 'rejected' | 'failed';

/**
 * Reasons the controller refuses a command
 */
export const REJECT_REASONS = {
  PREEMPTED: 'preempted',
  SAFETY_STOPPED: 'safety_stopped',
  OVERRIDE_ACTIVE: 'override_active',
  MIN_INTERVAL: 'min_interval',
  MAX_RUNTIME: 'max_runtime',
  PULSE_IN_FLIGHT: 'pulse_in_flight',
  UNKNOWN_ACTUATOR: 'unknown_actuator',
  INVALID_DURATION: 'invalid_duration'
} as const;

export type RejectReason = typeof REJECT_REASONS[keyof typeof REJECT_REASONS];

/**
 * Result of a command, one per command handed to the controller
 */
export interface CommandOutcome {
  readonly command: ActuatorCommand;
  readonly status: CommandStatus;
  /** Reject reason, failure detail or note on an unchanged command */
  readonly reason?: string;
  /** Pulse length actually applied after clamping */
  readonly effectiveDurationMs?: number;
}

// ═══════════════════════════════════════════════════════════════
// SAFETY
// ═══════════════════════════════════════════════════════════════

export const SAFETY_STATES = {
  NORMAL: 'normal',
  STOPPED: 'stopped',
  OVERRIDDEN: 'overridden'
} as const;

export type SafetyState = typeof SAFETY_STATES[keyof typeof SAFETY_STATES];

/**
 * Safety state change, emitted once per transition
 */
export interface SafetyTransition {
  readonly from: SafetyState;
  readonly to: SafetyState;
  readonly reason: string;
}

// ═══════════════════════════════════════════════════════════════
// SESSIONS
// ═══════════════════════════════════════════════════════════════

export interface ActivityEvent {
  readonly kind: string;
  readonly timestamp: EpochMs;
  readonly detail: string;
}

export type SessionEndReason = 'participant_left' | 'superseded' | 'ended' | 'shutdown';

/**
 * Supervised session record
 * activities is append-only; closed records are never modified.
 */
export interface Session {
  readonly sessionId: string;
  readonly participantRef: string;
  readonly startedAt: EpochMs;
  readonly endedAt?: EpochMs;
  readonly endReason?: SessionEndReason;
  readonly activities: readonly ActivityEvent[];
}

export interface SessionChange {
  readonly phase: 'opened' | 'closed';
  readonly session: Session;
}

// ═══════════════════════════════════════════════════════════════
// SENSOR HEALTH
// ═══════════════════════════════════════════════════════════════

export interface SensorHealthChange {
  readonly status: 'degraded' | 'recovered';
  readonly sourceId: string;
  /** Consecutive invalid reads at the time of the change */
  readonly consecutiveFailures: number;
}

// ═══════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════

/**
 * Interrupt-style input, queued and consumed at the next tick boundary
 */
export type InputMessage =
  | { readonly type: 'button'; readonly buttonId: string; readonly at: EpochMs }
  | { readonly type: 'safety_reset'; readonly at: EpochMs }
  | { readonly type: 'session_start'; readonly participantRef: string; readonly at: EpochMs }
  | { readonly type: 'session_end'; readonly at: EpochMs }
  | { readonly type: 'manual_command'; readonly actuatorId: string; readonly action: ActuatorAction; readonly at: EpochMs };

export type InputMessageType = InputMessage['type'];

// ═══════════════════════════════════════════════════════════════
// EVENT LOG
// ═══════════════════════════════════════════════════════════════

/**
 * Tagged event as written to the event sink
 */
export type ControlEvent =
  | { readonly type: 'reading'; readonly timestamp: EpochMs; readonly payload: SensorReading }
  | { readonly type: 'command'; readonly timestamp: EpochMs; readonly payload: CommandOutcome }
  | { readonly type: 'session'; readonly timestamp: EpochMs; readonly payload: SessionChange }
  | { readonly type: 'safety'; readonly timestamp: EpochMs; readonly payload: SafetyTransition }
  | { readonly type: 'sensor'; readonly timestamp: EpochMs; readonly payload: SensorHealthChange };

export type ControlEventType = ControlEvent['type'];

/**
 * Durable event log (file, database, message bus)
 */
export interface EventSink {
  append(event: ControlEvent): void | Promise<void>;
}

/**
 * What components publish to; never blocks and never throws
 */
export interface EventPublisher {
  publish(event: ControlEvent): void;
}
