/**
 * Actuator controller
 *
 * The only caller of the actuator sink. Each batch is arbitrated per
 * actuator, checked against the safety state and rate limits, and applied on
 * that actuator's own operation chain so two operations on one actuator never
 * overlap. Pulses are ended by controller-owned timers.
 */

import type { ActuatorSpec } from '$types';
import { describeError } from '$types';
import {
  checkActivation,
  createRateLimitRecord,
  exceededOnLimit,
  recordActivation,
  recordDeactivation,
  remainingBudgetMs,
  runtimeInWindow,
  toRateLimitConfig
} from '@core/rate-limit';
import { REJECT_REASONS, SAFETY_STATES, formatOutcome } from '@events';
import type { ActuatorCommand, CommandOutcome, RejectReason, SafetyState } from '@events';
import { setActuator } from '@hardware/actuators';
import { TIME_CONSTANTS } from '@utils/constants';
import { arbitrate, groupByActuator, isValidDuration } from './helpers';
import type {
  ActuatorController,
  ActuatorControllerConfig,
  ActuatorControllerDependencies,
  ActuatorRuntime,
  ActuatorSnapshot
} from './types';

function rejected(command: ActuatorCommand, reason: RejectReason): CommandOutcome {
  return { command: command, status: 'rejected', reason: reason };
}

/**
 * Create the actuator controller
 *
 * @param actuators - Static actuator registry
 * @param deps - Sink, timer, logger, publisher and clock
 * @param config - Sink call timeout
 * @returns Actuator controller
 */
export function createActuatorController(
  actuators: readonly ActuatorSpec[],
  deps: ActuatorControllerDependencies,
  config: ActuatorControllerConfig
): ActuatorController {
  const logger = deps.logger;
  const runtimes = new Map<string, ActuatorRuntime>();
  for (const spec of actuators) {
    runtimes.set(spec.id, {
      spec: spec,
      limits: toRateLimitConfig(spec),
      record: createRateLimitRecord(),
      pulseTimerId: null,
      pulseEndsAt: null,
      pendingOff: null,
      lastOutcome: null,
      chain: Promise.resolve()
    });
  }

  // ───────── SERIALISATION ─────────

  function enqueue(rt: ActuatorRuntime, task: () => Promise<CommandOutcome>): Promise<CommandOutcome> {
    const run = rt.chain.then(task);
    // The chain only orders work; each task resolves with its own outcome
    rt.chain = run.then(function() { return undefined; }, function(err: unknown) {
      logger.critical('Actuator ' + rt.spec.id + ' operation crashed: ' + describeError(err));
    });
    return run;
  }

  function report(rt: ActuatorRuntime | null, outcome: CommandOutcome, now: number): CommandOutcome {
    if (rt !== null) {
      rt.lastOutcome = outcome;
    }
    deps.publisher.publish({ type: 'command', timestamp: now, payload: outcome });

    const line = formatOutcome(outcome);
    if (outcome.status === 'failed') {
      logger.warning(line);
    } else if (outcome.status === 'unchanged') {
      logger.debug(line);
    } else {
      logger.info(line);
    }
    return outcome;
  }

  // ───────── SINK OPERATIONS ─────────

  function cancelPulse(rt: ActuatorRuntime): void {
    if (rt.pulseTimerId !== null) {
      deps.timerApi.clear(rt.pulseTimerId);
    }
    rt.pulseTimerId = null;
    rt.pulseEndsAt = null;
  }

  async function driveOff(rt: ActuatorRuntime, command: ActuatorCommand, now: number): Promise<CommandOutcome> {
    try {
      await setActuator(deps.sink, rt.spec.id, false, deps.timerApi, config.ACTUATOR_TIMEOUT_MS);
    } catch (err) {
      // Still possibly running: keep it marked on and retry from enforceLimits
      rt.pendingOff = command;
      return { command: command, status: 'failed', reason: describeError(err) };
    }
    rt.pendingOff = null;
    recordDeactivation(rt.record, now, rt.limits.runtimeWindowMs);
    return { command: command, status: 'executed' };
  }

  async function driveOn(rt: ActuatorRuntime, command: ActuatorCommand, now: number, pulseMs: number | null): Promise<CommandOutcome> {
    try {
      await setActuator(deps.sink, rt.spec.id, true, deps.timerApi, config.ACTUATOR_TIMEOUT_MS);
    } catch (err) {
      // A late answer may still have switched it on: enforceLimits drives it off
      rt.pendingOff = {
        actuatorId: rt.spec.id,
        action: { type: 'off' },
        origin: 'safety',
        issuedAt: now,
        reason: 'on not confirmed',
        source: 'controller'
      };
      return { command: command, status: 'failed', reason: describeError(err) };
    }
    rt.pendingOff = null;
    recordActivation(rt.record, now);

    if (pulseMs === null) {
      return { command: command, status: 'executed' };
    }

    rt.pulseEndsAt = now + pulseMs;
    rt.pulseTimerId = deps.timerApi.set(pulseMs, false, function() {
      rt.pulseTimerId = null;
      endPulse(rt, command);
    });
    return { command: command, status: 'executed', effectiveDurationMs: pulseMs };
  }

  function endPulse(rt: ActuatorRuntime, started: ActuatorCommand): void {
    enqueue(rt, function() {
      const now = deps.clock();
      rt.pulseEndsAt = null;
      const off: ActuatorCommand = {
        actuatorId: rt.spec.id,
        action: { type: 'off' },
        origin: started.origin,
        issuedAt: now,
        reason: 'pulse ended',
        source: started.source
      };
      return driveOff(rt, off, now).then(function(outcome) { return report(rt, outcome, now); });
    }).catch(function(err: unknown) {
      logger.critical('Pulse end for ' + rt.spec.id + ' failed: ' + describeError(err));
    });
  }

  // ───────── COMMAND APPLICATION ─────────

  function applyOff(rt: ActuatorRuntime, command: ActuatorCommand, safetyState: SafetyState, now: number): Promise<CommandOutcome> {
    if (command.origin === 'safety') {
      cancelPulse(rt);
      return driveOff(rt, command, now);
    }
    if (safetyState === SAFETY_STATES.STOPPED) {
      return Promise.resolve(rejected(command, REJECT_REASONS.SAFETY_STOPPED));
    }
    if (safetyState === SAFETY_STATES.OVERRIDDEN && command.origin === 'scheduler') {
      return Promise.resolve(rejected(command, REJECT_REASONS.OVERRIDE_ACTIVE));
    }
    if (rt.pulseTimerId !== null) {
      if (command.origin !== 'human') {
        return Promise.resolve(rejected(command, REJECT_REASONS.PULSE_IN_FLIGHT));
      }
      cancelPulse(rt);
      return driveOff(rt, command, now);
    }
    if (!rt.record.on && rt.pendingOff === null) {
      return Promise.resolve({ command: command, status: 'unchanged', reason: 'already off' });
    }
    return driveOff(rt, command, now);
  }

  function applyActivation(rt: ActuatorRuntime, command: ActuatorCommand, safetyState: SafetyState, now: number): Promise<CommandOutcome> {
    if (safetyState === SAFETY_STATES.STOPPED && command.origin !== 'safety') {
      return Promise.resolve(rejected(command, REJECT_REASONS.SAFETY_STOPPED));
    }
    if (safetyState === SAFETY_STATES.OVERRIDDEN && command.origin === 'scheduler') {
      return Promise.resolve(rejected(command, REJECT_REASONS.OVERRIDE_ACTIVE));
    }
    if (rt.pulseTimerId !== null) {
      return Promise.resolve(rejected(command, REJECT_REASONS.PULSE_IN_FLIGHT));
    }
    if (command.action.type === 'pulse' && !isValidDuration(command.action.durationMs)) {
      return Promise.resolve(rejected(command, REJECT_REASONS.INVALID_DURATION));
    }
    if (rt.record.on) {
      return Promise.resolve({ command: command, status: 'unchanged', reason: 'already on' });
    }

    const limit = checkActivation(rt.record, now, rt.limits);
    if (!limit.allow && limit.reason !== undefined) {
      return Promise.resolve(rejected(command, limit.reason));
    }

    if (command.action.type !== 'pulse') {
      return driveOn(rt, command, now, null);
    }
    const pulseMs = Math.min(
      command.action.durationMs,
      rt.spec.maxPulseSec * TIME_CONSTANTS.MS_PER_SECOND,
      remainingBudgetMs(rt.record, now, rt.limits)
    );
    return driveOn(rt, command, now, pulseMs);
  }

  function apply(rt: ActuatorRuntime, command: ActuatorCommand, safetyState: SafetyState, now: number): Promise<CommandOutcome> {
    if (command.action.type === 'off') {
      return applyOff(rt, command, safetyState, now);
    }
    return applyActivation(rt, command, safetyState, now);
  }

  // ───────── PUBLIC API ─────────

  async function execute(commands: readonly ActuatorCommand[], safetyState: SafetyState, now: number): Promise<CommandOutcome[]> {
    const outcomes: (CommandOutcome | null)[] = commands.map(function() { return null; });
    const pending: Promise<void>[] = [];

    for (const entry of groupByActuator(commands)) {
      const indexes = entry[1];
      const rt = runtimes.get(entry[0]) ?? null;

      if (rt === null) {
        for (const index of indexes) {
          outcomes[index] = report(null, rejected(commands[index], REJECT_REASONS.UNKNOWN_ACTUATOR), now);
        }
        continue;
      }

      const group = indexes.map(function(index) { return commands[index]; });
      const decisions = arbitrate(group);
      decisions.forEach(function(decision, position) {
        const index = indexes[position];
        if (decision !== null) {
          outcomes[index] = report(rt, decision, now);
          return;
        }
        pending.push(enqueue(rt, function() {
          return apply(rt, commands[index], safetyState, now);
        }).then(function(outcome) {
          outcomes[index] = report(rt, outcome, now);
        }));
      });
    }

    await Promise.all(pending);
    return outcomes.filter(function(outcome): outcome is CommandOutcome { return outcome !== null; });
  }

  async function enforceLimits(now: number): Promise<CommandOutcome[]> {
    const pending: Promise<CommandOutcome>[] = [];

    for (const rt of runtimes.values()) {
      const retry = rt.pendingOff;
      if (retry !== null) {
        const again: ActuatorCommand = { ...retry, issuedAt: now, reason: 'retry: ' + (retry.reason ?? 'off') };
        pending.push(enqueue(rt, function() { return driveOff(rt, again, now); }));
        continue;
      }
      if (rt.pulseTimerId !== null) {
        continue;
      }
      const exceeded = exceededOnLimit(rt.record, now, rt.limits);
      if (exceeded === null) {
        continue;
      }
      const cut: ActuatorCommand = {
        actuatorId: rt.spec.id,
        action: { type: 'off' },
        origin: 'safety',
        issuedAt: now,
        reason: exceeded + ' limit reached',
        source: 'controller'
      };
      pending.push(enqueue(rt, function() { return driveOff(rt, cut, now); }));
    }

    const outcomes = await Promise.all(pending);
    return outcomes.map(function(outcome) {
      const rt = runtimes.get(outcome.command.actuatorId) ?? null;
      return report(rt, outcome, now);
    });
  }

  function getSnapshot(now: number): ActuatorSnapshot[] {
    const result: ActuatorSnapshot[] = [];
    for (const rt of runtimes.values()) {
      result.push({
        actuatorId: rt.spec.id,
        on: rt.record.on,
        pulseInFlight: rt.pulseTimerId !== null,
        pulseEndsAt: rt.pulseEndsAt,
        runtimeInWindowMs: runtimeInWindow(rt.record, now, rt.limits.runtimeWindowMs),
        pendingOff: rt.pendingOff !== null,
        lastOutcome: rt.lastOutcome
      });
    }
    return result;
  }

  async function shutdown(now: number): Promise<CommandOutcome[]> {
    const commands: ActuatorCommand[] = [];
    for (const rt of runtimes.values()) {
      cancelPulse(rt);
      commands.push({
        actuatorId: rt.spec.id,
        action: { type: 'off' },
        origin: 'safety',
        issuedAt: now,
        reason: 'shutdown',
        source: 'controller'
      });
    }
    return execute(commands, SAFETY_STATES.STOPPED, now);
  }

  return {
    execute: execute,
    enforceLimits: enforceLimits,
    getSnapshot: getSnapshot,
    shutdown: shutdown
  };
}
