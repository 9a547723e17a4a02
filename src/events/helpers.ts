/**
 * Formatting helpers for commands and outcomes
 */

import type { ActuatorAction, ActuatorCommand, CommandOutcome } from './types';

/**
 * Short label for an action ("on", "off", "pulse 20s")
 */
export function formatAction(action: ActuatorAction): string {
  if (action.type === 'pulse') {
    return 'pulse ' + Math.round(action.durationMs / 100) / 10 + 's';
  }
  return action.type;
}

/**
 * One-line description of a command
 * @example "fan on [scheduler: rule fan-heat engaged]"
 */
export function formatCommand(command: ActuatorCommand): string {
  return command.actuatorId + ' ' + formatAction(command.action) + ' [' + command.origin + (command.reason !== undefined ? ': ' + command.reason : '') + ']';
}

/**
 * One-line description of an outcome
 * @example "pump pulse 30s [human: button water] -> rejected (min_interval)"
 */
export function formatOutcome(outcome: CommandOutcome): string {
  return formatCommand(outcome.command) + ' -> ' + outcome.status + (outcome.reason !== undefined ? ' (' + outcome.reason + ')' : '');
}
