/**
 * Operator console
 *
 * Parses the line commands typed at the simulated bench and applies them:
 * switch changes go straight to the bench inputs, everything else is queued
 * for the next tick like any other interrupt-style input.
 */

import type { ActuatorAction, InputMessage } from '@events';
import type { SwitchInput } from '@hardware/simulated';
import type { InputQueue } from '@system/inputs';
import { TIME_CONSTANTS } from '@utils/constants';

/**
 * Inputs without their arrival time; stamped when applied
 */
export type PendingInput =
  | { readonly type: 'button'; readonly buttonId: string }
  | { readonly type: 'safety_reset' }
  | { readonly type: 'session_start'; readonly participantRef: string }
  | { readonly type: 'session_end' }
  | { readonly type: 'manual_command'; readonly actuatorId: string; readonly action: ActuatorAction };

export type OperatorCommand =
  | { kind: 'estop'; asserted: boolean }
  | { kind: 'override'; asserted: boolean }
  | { kind: 'presence'; present: boolean }
  | { kind: 'input'; message: PendingInput; describe: string }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'invalid'; message: string };

export const OPERATOR_HELP: readonly string[] = [
  'estop | release          press / release the emergency stop',
  'reset                    request a safety reset',
  'override on|off          turn the manual override key',
  'presence on|off          step on / off the presence mat',
  'press <button>           press a session button',
  'start <participant>      open a session',
  'end                      close the open session',
  'on|off <actuator>        manual command',
  'pulse <actuator> <sec>   manual pulse',
  'status | help | quit'
];

function onOff(word: string | undefined, name: string): boolean | string {
  if (word === 'on') return true;
  if (word === 'off') return false;
  return 'Usage: ' + name + ' on|off';
}

function queued(message: PendingInput, describe: string): OperatorCommand {
  return { kind: 'input', message: message, describe: describe };
}

/**
 * Parse one operator line
 * @param line - Raw line from stdin
 * @returns Parsed command, or null for a blank line
 */
export function parseOperatorCommand(line: string): OperatorCommand | null {
  const words = line.trim().split(/\s+/).filter(function(w) { return w !== ''; });
  if (words.length === 0) {
    return null;
  }
  const verb = words[0].toLowerCase();
  const arg = words[1];

  switch (verb) {
    case 'estop':
      return { kind: 'estop', asserted: true };
    case 'release':
      return { kind: 'estop', asserted: false };
    case 'reset':
      return queued({ type: 'safety_reset' }, 'safety reset requested');
    case 'override':
    case 'presence': {
      const level = onOff(arg, verb);
      if (typeof level === 'string') {
        return { kind: 'invalid', message: level };
      }
      return verb === 'override' ? { kind: 'override', asserted: level } : { kind: 'presence', present: level };
    }
    case 'press':
      if (arg === undefined) return { kind: 'invalid', message: 'Usage: press <button>' };
      return queued({ type: 'button', buttonId: arg }, 'button ' + arg + ' pressed');
    case 'start':
      if (arg === undefined) return { kind: 'invalid', message: 'Usage: start <participant>' };
      return queued({ type: 'session_start', participantRef: arg }, 'session start for ' + arg);
    case 'end':
      return queued({ type: 'session_end' }, 'session end');
    case 'on':
    case 'off':
      if (arg === undefined) return { kind: 'invalid', message: 'Usage: ' + verb + ' <actuator>' };
      return queued({ type: 'manual_command', actuatorId: arg, action: verb === 'on' ? { type: 'on' } : { type: 'off' } }, arg + ' ' + verb);
    case 'pulse': {
      const seconds = Number(words[2]);
      if (arg === undefined || words[2] === undefined || !Number.isFinite(seconds) || seconds <= 0) {
        return { kind: 'invalid', message: 'Usage: pulse <actuator> <sec>' };
      }
      const action: ActuatorAction = { type: 'pulse', durationMs: seconds * TIME_CONSTANTS.MS_PER_SECOND };
      return queued({ type: 'manual_command', actuatorId: arg, action: action }, arg + ' pulse ' + seconds + 's');
    }
    case 'status':
      return { kind: 'status' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'invalid', message: 'Unknown command "' + verb + '" (try help)' };
  }
}

/**
 * What the operator console acts on
 */
export interface OperatorTarget {
  inputs: InputQueue;
  estop: SwitchInput;
  override: SwitchInput;
  presence: SwitchInput;
  /** Current status report lines */
  status(): string[];
}

export interface OperatorReply {
  lines: string[];
  quit: boolean;
}

function stamp(message: PendingInput, at: number): InputMessage {
  return { ...message, at: at };
}

/**
 * Apply a parsed command
 * @param command - Parsed command
 * @param target - Bench inputs, input queue and status source
 * @param now - Current time (ms)
 * @returns Lines to print and whether to shut down
 */
export function applyOperatorCommand(command: OperatorCommand, target: OperatorTarget, now: number): OperatorReply {
  switch (command.kind) {
    case 'estop':
      target.estop.set(command.asserted);
      return { lines: [command.asserted ? 'Emergency stop pressed' : 'Emergency stop released (reset to resume)'], quit: false };
    case 'override':
      target.override.set(command.asserted);
      return { lines: ['Manual override ' + (command.asserted ? 'on' : 'off')], quit: false };
    case 'presence':
      target.presence.set(command.present);
      return { lines: ['Presence ' + (command.present ? 'on' : 'off')], quit: false };
    case 'input':
      if (!target.inputs.push(stamp(command.message, now))) {
        return { lines: ['Ignored (debounced): ' + command.describe], quit: false };
      }
      return { lines: ['Queued: ' + command.describe], quit: false };
    case 'status':
      return { lines: target.status(), quit: false };
    case 'help':
      return { lines: OPERATOR_HELP.slice(), quit: false };
    case 'quit':
      return { lines: ['Shutting down'], quit: true };
    case 'invalid':
      return { lines: [command.message], quit: false };
  }
}
