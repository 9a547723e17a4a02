/**
 * Automation scheduler
 *
 * Turns the latest valid readings and the time of day into scheduler
 * commands. Rules run in declaration order; when two rules drive the same
 * actuator in one tick, the later rule wins. Rate limits are the
 * controller's job, not this module's.
 */

import type { RuleSpec, ThresholdRuleSpec, TimeWindowRuleSpec } from '$types';
import type { ActuatorCommand, SensorReading } from '@events';
import type { Logger } from '@logging';
import { fmtValue } from '@logging';
import { TIME_CONSTANTS } from '@utils/constants';
import { isWithinWindow, minuteOfDay, parseTimeOfDay } from '@utils/time';
import { cooldownElapsed, decideEngaged, differsFromActuator } from './helpers';
import type { ActuatorView, AutomationScheduler, RuleDesire, RuleState, SchedulerInput } from './types';

interface CompiledWindow {
  rule: TimeWindowRuleSpec;
  fromMinute: number;
  toMinute: number;
}

/**
 * Create the automation scheduler
 *
 * @param rules - Rules in declaration order
 * @param logger - Logger
 * @returns Automation scheduler
 */
export function createAutomationScheduler(rules: readonly RuleSpec[], logger: Logger): AutomationScheduler {
  const states = new Map<string, RuleState>();
  const windows = new Map<string, CompiledWindow>();

  for (const rule of rules) {
    states.set(rule.id, { engaged: false, lastProposedAt: null });
    if (rule.type === 'time_window') {
      const fromMinute = parseTimeOfDay(rule.from);
      const toMinute = parseTimeOfDay(rule.to);
      if (fromMinute === null || toMinute === null) {
        logger.warning('Rule ' + rule.id + ' has a malformed window ' + rule.from + '-' + rule.to + ', skipped');
        continue;
      }
      windows.set(rule.id, { rule: rule, fromMinute: fromMinute, toMinute: toMinute });
    }
  }

  function thresholdDesire(rule: ThresholdRuleSpec, state: RuleState, readings: Map<string, SensorReading>): RuleDesire | null {
    const reading = readings.get(rule.sensorId);
    if (reading === undefined) {
      return null;
    }

    const wasEngaged = state.engaged;
    state.engaged = decideEngaged(reading.value, wasEngaged, rule);
    if (state.engaged !== wasEngaged) {
      logger.debug('Rule ' + rule.id + (state.engaged ? ' engaged' : ' released') + ' at ' + fmtValue(reading.value, reading.unit));
    }

    const cooldownMs = rule.cooldownSec * TIME_CONSTANTS.MS_PER_SECOND;
    if (state.engaged) {
      const action = rule.action.type === 'pulse'
        ? { type: 'pulse' as const, durationMs: rule.action.durationSec * TIME_CONSTANTS.MS_PER_SECOND }
        : { type: 'on' as const };
      return { ruleId: rule.id, action: action, reason: 'rule ' + rule.id + ' engaged', cooldownMs: cooldownMs };
    }
    // A released pulse rule lets the running pulse end by itself
    if (rule.action.type === 'pulse') {
      return null;
    }
    return { ruleId: rule.id, action: { type: 'off' }, reason: 'rule ' + rule.id + ' released', cooldownMs: cooldownMs };
  }

  function windowDesire(rule: TimeWindowRuleSpec, state: RuleState, now: number): RuleDesire | null {
    const compiled = windows.get(rule.id);
    if (compiled === undefined) {
      return null;
    }

    state.engaged = isWithinWindow(minuteOfDay(now), compiled.fromMinute, compiled.toMinute);
    return {
      ruleId: rule.id,
      action: state.engaged ? { type: 'on' } : { type: 'off' },
      reason: 'rule ' + rule.id + (state.engaged ? ' window open' : ' window closed'),
      cooldownMs: rule.cooldownSec * TIME_CONSTANTS.MS_PER_SECOND
    };
  }

  function evaluate(input: SchedulerInput): ActuatorCommand[] {
    const readings = new Map<string, SensorReading>();
    for (const reading of input.readings) {
      if (reading.valid && reading.value !== null) {
        readings.set(reading.sourceId, reading);
      }
    }

    const views = new Map<string, ActuatorView>();
    for (const view of input.actuators) {
      views.set(view.actuatorId, view);
    }

    // Last write wins per actuator
    const winners = new Map<string, RuleDesire>();
    for (const rule of rules) {
      const state = states.get(rule.id);
      if (state === undefined) {
        continue;
      }
      const desire = rule.type === 'threshold'
        ? thresholdDesire(rule, state, readings)
        : windowDesire(rule, state, input.now);
      if (desire !== null) {
        winners.set(rule.actuatorId, desire);
      }
    }

    const commands: ActuatorCommand[] = [];
    for (const entry of winners) {
      const actuatorId = entry[0];
      const desire = entry[1];
      const view = views.get(actuatorId) ?? { actuatorId: actuatorId, on: false, pulseInFlight: false };
      const state = states.get(desire.ruleId);
      if (state === undefined || !differsFromActuator(desire.action, view)) {
        continue;
      }
      if (!cooldownElapsed(state.lastProposedAt, input.now, desire.cooldownMs)) {
        continue;
      }

      state.lastProposedAt = input.now;
      commands.push({
        actuatorId: actuatorId,
        action: desire.action,
        origin: 'scheduler',
        issuedAt: input.now,
        reason: desire.reason,
        source: desire.ruleId
      });
    }
    return commands;
  }

  return {
    evaluate: evaluate,
    getRuleState: function(ruleId: string) {
      const state = states.get(ruleId);
      return state === undefined ? null : { engaged: state.engaged, lastProposedAt: state.lastProposedAt };
    }
  };
}
