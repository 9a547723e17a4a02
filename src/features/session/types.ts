/**
 * Session manager type definitions
 */

import type { ButtonSpec } from '$types';
import type { ActivityEvent, ActuatorCommand, InputMessage, Session, SessionEndReason } from '@events';

export interface SessionConfig {
  SESSION_GRACE_SEC: number;
  DEFAULT_PARTICIPANT: string;
  INPUT_TIMEOUT_MS: number;
  BUTTONS: readonly ButtonSpec[];
}

/**
 * Open session while it is being recorded
 */
export interface OpenSession {
  sessionId: string;
  participantRef: string;
  startedAt: number;
  activities: ActivityEvent[];
}

/**
 * Presence tracking (mutated in place)
 */
export interface PresenceState {
  present: boolean;
  /** When presence dropped while a session was open; null when no grace is running */
  graceStartedAt: number | null;
  /** A read failure has been reported and not yet cleared */
  faultReported: boolean;
}

/** Messages the session manager consumes */
export type SessionMessage = Extract<InputMessage, { type: 'button' | 'session_start' | 'session_end' | 'manual_command' }>;

export interface SessionManager {
  /** Read presence and run the grace timer; never rejects */
  tick(now: number): Promise<void>;
  /** Apply one queued input; returns the human commands it produced */
  handle(message: SessionMessage, now: number): ActuatorCommand[];
  getCurrent(): Session | null;
  isPresent(): boolean;
  /** Close the open session, if any */
  close(reason: SessionEndReason, now: number): void;
}
