/**
 * Command arbitration helpers
 */

import { ORIGIN_PRIORITY, REJECT_REASONS } from '@events';
import type { ActuatorAction, ActuatorCommand, CommandOutcome } from '@events';

/**
 * Group a batch per actuator, keeping generation order inside each group
 * @param commands - Batch in generation order
 * @returns Map of actuator id to the batch indexes of its commands
 */
export function groupByActuator(commands: readonly ActuatorCommand[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  commands.forEach(function(command, index) {
    const group = groups.get(command.actuatorId);
    if (group === undefined) {
      groups.set(command.actuatorId, [index]);
    } else {
      group.push(index);
    }
  });
  return groups;
}

/**
 * Check whether two actions are the same request
 */
export function sameAction(a: ActuatorAction, b: ActuatorAction): boolean {
  if (a.type === 'pulse' && b.type === 'pulse') {
    return a.durationMs === b.durationMs;
  }
  return a.type === b.type;
}

/**
 * Arbitrate one actuator's commands
 *
 * The highest origin present wins (safety > human > scheduler); lower
 * origins are preempted. Repeats of an identical command are settled as
 * unchanged so a batch is idempotent.
 *
 * @param group - Commands for one actuator, in generation order
 * @returns Per command: the outcome it is settled with here, or null to apply it
 */
export function arbitrate(group: readonly ActuatorCommand[]): (CommandOutcome | null)[] {
  let top = 0;
  for (const command of group) {
    top = Math.max(top, ORIGIN_PRIORITY[command.origin]);
  }

  const accepted: ActuatorCommand[] = [];
  return group.map(function(command): CommandOutcome | null {
    if (ORIGIN_PRIORITY[command.origin] < top) {
      return { command: command, status: 'rejected', reason: REJECT_REASONS.PREEMPTED };
    }
    const duplicate = accepted.some(function(prior) { return sameAction(prior.action, command.action); });
    if (duplicate) {
      return { command: command, status: 'unchanged', reason: 'duplicate in batch' };
    }
    accepted.push(command);
    return null;
  });
}

/**
 * Check a pulse duration
 */
export function isValidDuration(durationMs: number): boolean {
  return Number.isFinite(durationMs) && durationMs > 0;
}
