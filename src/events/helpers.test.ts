import { formatAction, formatCommand, formatOutcome } from './helpers';
import type { ActuatorCommand } from './types';

const COMMAND: ActuatorCommand = {
  actuatorId: 'pump',
  action: { type: 'pulse', durationMs: 12500 },
  origin: 'human',
  issuedAt: 0,
  reason: 'button water'
};

describe('formatAction', () => {
  it('should label each action', () => {
    expect(formatAction({ type: 'on' })).toBe('on');
    expect(formatAction({ type: 'off' })).toBe('off');
    expect(formatAction({ type: 'pulse', durationMs: 20000 })).toBe('pulse 20s');
    expect(formatAction({ type: 'pulse', durationMs: 12500 })).toBe('pulse 12.5s');
  });
});

describe('formatCommand', () => {
  it('should include origin and reason', () => {
    expect(formatCommand(COMMAND)).toBe('pump pulse 12.5s [human: button water]');
    expect(formatCommand({ actuatorId: 'fan', action: { type: 'off' }, origin: 'safety', issuedAt: 0 })).toBe('fan off [safety]');
  });
});

describe('formatOutcome', () => {
  it('should append status and reason', () => {
    expect(formatOutcome({ command: COMMAND, status: 'rejected', reason: 'min_interval' })).toBe('pump pulse 12.5s [human: button water] -> rejected (min_interval)');
    expect(formatOutcome({ command: COMMAND, status: 'executed' })).toBe('pump pulse 12.5s [human: button water] -> executed');
  });
});
