/**
 * Tests for the operator console
 */

import { createFakeLogger } from '$test-utils';
import { createSwitchInput } from '@hardware/simulated';
import { createInputQueue } from '@system/inputs';
import { OPERATOR_HELP, applyOperatorCommand, parseOperatorCommand } from './operator';
import type { OperatorTarget } from './operator';

describe('parseOperatorCommand', () => {
  it('should ignore blank lines', () => {
    expect(parseOperatorCommand('   ')).toBeNull();
  });

  it('should parse the safety switches', () => {
    expect(parseOperatorCommand('estop')).toEqual({ kind: 'estop', asserted: true });
    expect(parseOperatorCommand('release')).toEqual({ kind: 'estop', asserted: false });
    expect(parseOperatorCommand('override on')).toEqual({ kind: 'override', asserted: true });
    expect(parseOperatorCommand('presence off')).toEqual({ kind: 'presence', present: false });
    expect(parseOperatorCommand('override maybe')).toEqual({ kind: 'invalid', message: 'Usage: override on|off' });
  });

  it('should queue resets and session inputs', () => {
    expect(parseOperatorCommand('reset')).toEqual({ kind: 'input', message: { type: 'safety_reset' }, describe: 'safety reset requested' });
    expect(parseOperatorCommand('  START  alice ')).toEqual({
      kind: 'input',
      message: { type: 'session_start', participantRef: 'alice' },
      describe: 'session start for alice'
    });
    expect(parseOperatorCommand('press water')).toEqual({
      kind: 'input',
      message: { type: 'button', buttonId: 'water' },
      describe: 'button water pressed'
    });
    expect(parseOperatorCommand('press')).toEqual({ kind: 'invalid', message: 'Usage: press <button>' });
  });

  it('should parse manual commands', () => {
    expect(parseOperatorCommand('off fan')).toEqual({
      kind: 'input',
      message: { type: 'manual_command', actuatorId: 'fan', action: { type: 'off' } },
      describe: 'fan off'
    });
    expect(parseOperatorCommand('pulse pump 2.5')).toEqual({
      kind: 'input',
      message: { type: 'manual_command', actuatorId: 'pump', action: { type: 'pulse', durationMs: 2500 } },
      describe: 'pump pulse 2.5s'
    });
    expect(parseOperatorCommand('pulse pump -1')).toEqual({ kind: 'invalid', message: 'Usage: pulse <actuator> <sec>' });
  });

  it('should reject unknown verbs', () => {
    expect(parseOperatorCommand('water now')).toEqual({ kind: 'invalid', message: 'Unknown command "water" (try help)' });
  });
});

describe('applyOperatorCommand', () => {
  let target: OperatorTarget;

  beforeEach(() => {
    target = {
      inputs: createInputQueue({ INPUT_DEBOUNCE_MS: 150, INPUT_QUEUE_SIZE: 8 }, createFakeLogger()),
      estop: createSwitchInput(),
      override: createSwitchInput(),
      presence: createSwitchInput(),
      status: function() { return ['Safety: normal']; }
    };
  });

  it('should flip bench switches directly', () => {
    const reply = applyOperatorCommand({ kind: 'estop', asserted: true }, target, 0);

    expect(reply).toEqual({ lines: ['Emergency stop pressed'], quit: false });
    expect(target.estop.get()).toBe(true);
  });

  it('should stamp and queue inputs', () => {
    const reply = applyOperatorCommand({ kind: 'input', message: { type: 'button', buttonId: 'water' }, describe: 'button water pressed' }, target, 1234);

    expect(reply.lines).toEqual(['Queued: button water pressed']);
    expect(target.inputs.drain()).toEqual([{ type: 'button', buttonId: 'water', at: 1234 }]);
  });

  it('should report a debounced repeat', () => {
    const command = { kind: 'input', message: { type: 'button', buttonId: 'water' }, describe: 'button water pressed' } as const;

    applyOperatorCommand(command, target, 1000);
    const reply = applyOperatorCommand(command, target, 1050);

    expect(reply.lines).toEqual(['Ignored (debounced): button water pressed']);
  });

  it('should answer status, help and quit', () => {
    expect(applyOperatorCommand({ kind: 'status' }, target, 0).lines).toEqual(['Safety: normal']);
    expect(applyOperatorCommand({ kind: 'help' }, target, 0).lines).toEqual(OPERATOR_HELP);
    expect(applyOperatorCommand({ kind: 'quit' }, target, 0)).toEqual({ lines: ['Shutting down'], quit: true });
  });
});
