/**
 * Scheduler decision helpers
 */

import type { ThresholdRuleSpec } from '$types';
import type { ActuatorAction } from '@events';
import type { ActuatorView } from './types';

/**
 * Apply threshold hysteresis
 *
 * The latch only changes when the value crosses the far threshold:
 * - 'above': engage at value >= onAt, release at value <= offAt
 * - 'below': engage at value <= onAt, release at value >= offAt
 *
 * @param value - Latest valid value, null when missing or invalid
 * @param engaged - Current latch
 * @param rule - Threshold rule
 * @returns New latch
 */
export function decideEngaged(
  value: number | null,
  engaged: boolean,
  rule: Pick<ThresholdRuleSpec, 'direction' | 'onAt' | 'offAt'>
): boolean {
  // No reading: keep the latch
  if (value === null) {
    return engaged;
  }

  if (rule.direction === 'above') {
    return engaged ? value > rule.offAt : value >= rule.onAt;
  }
  return engaged ? value < rule.offAt : value <= rule.onAt;
}

/**
 * Check whether an action would change the actuator
 * @param action - Desired action
 * @param view - Actuator as last reported by the controller
 * @returns True when the command is worth proposing
 */
export function differsFromActuator(action: ActuatorAction, view: ActuatorView): boolean {
  if (view.pulseInFlight) {
    return false;
  }
  if (action.type === 'off') {
    return view.on;
  }
  return !view.on;
}

/**
 * Check whether a rule's cooldown has elapsed
 */
export function cooldownElapsed(lastProposedAt: number | null, now: number, cooldownMs: number): boolean {
  return lastProposedAt === null || now - lastProposedAt >= cooldownMs;
}
