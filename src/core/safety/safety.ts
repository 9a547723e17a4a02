/**
 * Safety monitor
 *
 * Owns the safety state. Each tick reads the emergency stop and the override
 * input in parallel, each bounded by INPUT_TIMEOUT_MS. An unreadable input is
 * a safety fault and counts as stop asserted.
 */

import { SafetyFaultError, describeError } from '$types';
import type { TimerAPI } from '$types';
import { SAFETY_STATES } from '@events';
import type { ActuatorCommand, EventPublisher, SafetyState, SafetyTransition } from '@events';
import { readInput } from '@hardware/inputs';
import type { Logger } from '@logging';
import { nextSafetyState } from './helpers';
import type { SafetyInputLevels, SafetyInputs, SafetyMonitor, SafetyMonitorConfig, SafetySnapshot, SafetyTickResult } from './types';

/**
 * Create the safety monitor
 *
 * @param inputs - Emergency stop and override inputs
 * @param actuatorIds - Every registered actuator, all switched off on a stop
 * @param timerApi - Timer for input deadlines
 * @param logger - Logger
 * @param publisher - Event publisher for transitions
 * @param config - Input timeout
 * @param startMs - Time the monitor starts in `normal`
 * @returns Safety monitor
 */
export function createSafetyMonitor(
  inputs: SafetyInputs,
  actuatorIds: readonly string[],
  timerApi: TimerAPI,
  logger: Logger,
  publisher: EventPublisher,
  config: SafetyMonitorConfig,
  startMs: number
): SafetyMonitor {
  let state: SafetyState = SAFETY_STATES.NORMAL;
  let reason = 'startup';
  let since = startMs;
  let resetRequested = false;

  async function readLevels(): Promise<SafetyInputLevels> {
    const results = await Promise.allSettled([
      readInput(inputs.estop, 'estop', timerApi, config.INPUT_TIMEOUT_MS),
      readInput(inputs.override, 'override', timerApi, config.INPUT_TIMEOUT_MS)
    ]);
    const estop = results[0];
    const override = results[1];

    let fault: string | null = null;
    if (estop.status === 'rejected') {
      fault = new SafetyFaultError('estop', describeError(estop.reason)).message;
    } else if (override.status === 'rejected') {
      fault = new SafetyFaultError('override', describeError(override.reason)).message;
    }

    return {
      stopAsserted: fault !== null || (estop.status === 'fulfilled' && estop.value),
      overrideAsserted: override.status === 'fulfilled' && override.value,
      fault: fault,
      resetRequested: resetRequested
    };
  }

  function stopCommands(now: number, cause: string): ActuatorCommand[] {
    return actuatorIds.map(function(actuatorId): ActuatorCommand {
      return {
        actuatorId: actuatorId,
        action: { type: 'off' },
        origin: 'safety',
        issuedAt: now,
        reason: cause,
        source: 'estop'
      };
    });
  }

  async function tick(now: number): Promise<SafetyTickResult> {
    let levels: SafetyInputLevels;
    try {
      levels = await readLevels();
    } catch (err) {
      levels = { stopAsserted: true, overrideAsserted: false, fault: describeError(err), resetRequested: resetRequested };
    }
    const pendingReset = resetRequested;
    resetRequested = false;

    const decision = nextSafetyState(state, levels);

    if (decision.resetRefused !== undefined) {
      logger.warning('Safety reset refused: ' + decision.resetRefused);
    } else if (pendingReset && state !== SAFETY_STATES.STOPPED) {
      logger.info('Safety reset ignored: state is ' + state);
    }

    if (decision.next === null) {
      return { state: state, transition: null, commands: [] };
    }

    const transition: SafetyTransition = { from: state, to: decision.next, reason: decision.reason };
    state = decision.next;
    reason = decision.reason;
    since = now;

    publisher.publish({ type: 'safety', timestamp: now, payload: transition });

    if (state === SAFETY_STATES.STOPPED) {
      logger.critical('SAFETY STOP: ' + reason + ' (' + transition.from + ' -> stopped)');
      return { state: state, transition: transition, commands: stopCommands(now, reason) };
    }

    logger.info('Safety state ' + transition.from + ' -> ' + state + ': ' + reason);
    return { state: state, transition: transition, commands: [] };
  }

  return {
    tick: tick,
    requestReset: function() { resetRequested = true; },
    getState: function() { return state; },
    getSnapshot: function(): SafetySnapshot {
      return { state: state, reason: reason, since: since };
    }
  };
}
