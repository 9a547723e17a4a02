/**
 * Safety state machine
 */

import { SAFETY_STATES } from '@events';
import type { SafetyState } from '@events';
import type { SafetyDecision, SafetyInputLevels } from './types';

/**
 * Decide the next safety state
 *
 * - stop asserted (or a fault) latches `stopped` from any state
 * - `stopped` is left only by a reset, and only while the stop input reads
 *   released and healthy
 * - override moves between `normal` and `overridden` and never leaves `stopped`
 *
 * @param current - Current state
 * @param levels - Input levels this tick
 * @returns Next state (null to stay) with the cause
 */
export function nextSafetyState(current: SafetyState, levels: SafetyInputLevels): SafetyDecision {
  if (current === SAFETY_STATES.STOPPED) {
    if (!levels.resetRequested) {
      return { next: null, reason: '' };
    }
    if (levels.fault !== null) {
      return { next: null, reason: '', resetRefused: levels.fault };
    }
    if (levels.stopAsserted) {
      return { next: null, reason: '', resetRefused: 'emergency stop still asserted' };
    }
    if (levels.overrideAsserted) {
      return { next: SAFETY_STATES.OVERRIDDEN, reason: 'operator reset (override asserted)' };
    }
    return { next: SAFETY_STATES.NORMAL, reason: 'operator reset' };
  }

  if (levels.stopAsserted) {
    return { next: SAFETY_STATES.STOPPED, reason: levels.fault !== null ? levels.fault : 'emergency stop asserted' };
  }

  if (current === SAFETY_STATES.NORMAL && levels.overrideAsserted) {
    return { next: SAFETY_STATES.OVERRIDDEN, reason: 'manual override asserted' };
  }

  if (current === SAFETY_STATES.OVERRIDDEN && !levels.overrideAsserted) {
    return { next: SAFETY_STATES.NORMAL, reason: 'manual override released' };
  }

  return { next: null, reason: '' };
}
