/**
 * Session helper functions
 */

import type { HumanActionSpec } from '$types';
import type { ActuatorAction, Session, SessionEndReason } from '@events';
import { TIME_CONSTANTS } from '@utils/constants';
import type { OpenSession } from './types';

/**
 * Convert a configured button action into a controller action
 */
export function toActuatorAction(spec: HumanActionSpec): ActuatorAction {
  if (spec.type === 'pulse') {
    return { type: 'pulse', durationMs: spec.durationSec * TIME_CONSTANTS.MS_PER_SECOND };
  }
  return { type: spec.type };
}

/**
 * Immutable view of an open session
 */
export function snapshotSession(open: OpenSession): Session {
  return {
    sessionId: open.sessionId,
    participantRef: open.participantRef,
    startedAt: open.startedAt,
    activities: open.activities.slice()
  };
}

/**
 * Final record of a session
 */
export function closeSessionRecord(open: OpenSession, reason: SessionEndReason, now: number): Session {
  return {
    sessionId: open.sessionId,
    participantRef: open.participantRef,
    startedAt: open.startedAt,
    endedAt: now,
    endReason: reason,
    activities: open.activities.slice()
  };
}

/**
 * Check whether the presence grace period has run out
 */
export function graceExpired(graceStartedAt: number | null, now: number, graceSec: number): boolean {
  return graceStartedAt !== null && now - graceStartedAt >= graceSec * TIME_CONSTANTS.MS_PER_SECOND;
}
