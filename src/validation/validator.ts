/**
 * Configuration validator
 *
 * Checks ranges and cross-field consistency of a parsed configuration.
 * Errors refuse start-up; warnings are reported and the run continues.
 */

import type { ActuatorSpec, ButtonSpec, GrowConfig, GrowUserConfig, RuleSpec, SensorSpec, ThresholdRuleSpec } from '$types';
import { parseTimeOfDay } from '@utils/time';
import { addError, addWarning, checkBounds, checkEntityBounds } from './helpers';
import type { Bounds, ValidationError, ValidationResult, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// SCALAR SETTINGS
// ═══════════════════════════════════════════════════════════════

type NumericSetting = {
  [K in keyof GrowUserConfig]: GrowUserConfig[K] extends number ? K : never
}[keyof GrowUserConfig];

/**
 * Bounds of every numeric user setting
 * The tick and sampling limits come from the app constants.
 */
function settingBounds(config: GrowConfig): readonly (readonly [NumericSetting, Bounds])[] {
  return [
    ['TICK_PERIOD_MS', { min: config.MIN_TICK_PERIOD_MS, max: config.MAX_TICK_PERIOD_MS, integer: true, recommended: [100, 1000] }],
    ['SAMPLE_PERIOD_SEC', { min: config.MIN_SAMPLE_PERIOD_SEC, max: config.MAX_SAMPLE_PERIOD_SEC, recommended: [10, 120] }],
    ['SENSOR_TIMEOUT_MS', { min: 10, max: 60000, integer: true, recommended: [100, 5000] }],
    ['ACTUATOR_TIMEOUT_MS', { min: 10, max: 60000, integer: true, recommended: [100, 5000] }],
    ['INPUT_TIMEOUT_MS', { min: 10, max: 60000, integer: true }],
    ['SENSOR_DEGRADED_AFTER', { min: 1, max: 100, integer: true, recommended: [2, 10] }],
    ['SESSION_GRACE_SEC', { min: 0, max: 3600, recommended: [5, 120] }],
    ['INPUT_DEBOUNCE_MS', { min: 0, max: 5000, integer: true, recommended: [20, 500] }],
    ['INPUT_QUEUE_SIZE', { min: 1, max: 1000, integer: true }],
    ['EVENT_QUEUE_SIZE', { min: 10, max: 100000, integer: true, recommended: [100, 10000] }],
    ['EVENT_DRAIN_INTERVAL_MS', { min: 10, max: 60000, integer: true }],
    ['SLACK_BUFFER_SIZE', { min: 1, max: 100, integer: true }],
    ['SLACK_RETRY_DELAY_SEC', { min: 1, max: 60 }],
    ['CONSOLE_BUFFER_SIZE', { min: 10, max: 10000, integer: true }],
    ['CONSOLE_INTERVAL_MS', { min: 10, max: 5000, integer: true }],
    ['GLOBAL_LOG_AUTO_DEMOTE_HOURS', { min: 0, max: 168 }]
  ];
}

function validateSettings(config: GrowConfig, errors: ValidationError[], warnings: ValidationWarning[]): void {
  for (const entry of settingBounds(config)) {
    checkBounds(config[entry[0]], entry[0], entry[0], entry[1], errors, warnings);
  }

  if (config.SENSOR_TIMEOUT_MS >= config.SAMPLE_PERIOD_SEC * 1000) {
    addError(errors, 'SENSOR_TIMEOUT_MS', 'SENSOR_TIMEOUT_MS must be shorter than the sampling period');
  }
  if (config.INPUT_TIMEOUT_MS > config.TICK_PERIOD_MS) {
    addWarning(warnings, 'INPUT_TIMEOUT_MS', 'INPUT_TIMEOUT_MS exceeds TICK_PERIOD_MS; a hung input will make ticks overrun');
  }
  if (config.DEFAULT_PARTICIPANT.trim() === '') {
    addError(errors, 'DEFAULT_PARTICIPANT', 'DEFAULT_PARTICIPANT must not be empty');
  }
  if (config.SLACK_ENABLED && config.SLACK_WEBHOOK_URL === '') {
    addWarning(warnings, 'SLACK_WEBHOOK_URL', 'SLACK_ENABLED is set but SLACK_WEBHOOK_URL is empty; Slack output is off');
  }
}

// ═══════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════

/**
 * Report ids that appear more than once
 * @returns Set of the ids seen
 */
function collectIds(items: readonly { id: string }[], field: string, errors: ValidationError[]): Set<string> {
  const seen = new Set<string>();
  for (let i = 0; i < items.length; i++) {
    const id = items[i].id;
    if (id.trim() === '') {
      addError(errors, field + '[' + i + '].id', 'id must not be empty');
    } else if (seen.has(id)) {
      addError(errors, field + '[' + i + '].id', 'Duplicate id "' + id + '"');
    }
    seen.add(id);
  }
  return seen;
}

function validateSensor(sensor: SensorSpec, field: string, errors: ValidationError[]): void {
  if (sensor.unit.trim() === '') {
    addError(errors, field + '.unit', 'unit must not be empty');
  }
  if (!(sensor.min < sensor.max)) {
    addError(errors, field + '.min', 'min must be below max (got ' + sensor.min + ' >= ' + sensor.max + ')');
  }
}

const ACTUATOR_LIMITS = {
  minIntervalSec: { min: 0, max: 86400 },
  maxRuntimeSec: { min: 1, max: 86400 },
  runtimeWindowSec: { min: 1, max: 604800 },
  maxPulseSec: { min: 1, max: 86400 },
  maxOnSec: { min: 1, max: 86400 }
} as const satisfies Record<string, Bounds>;

/** Pulse lengths and cooldowns of rules and buttons */
const DURATION_SEC: Bounds = { min: 1, max: 86400 };
const COOLDOWN_SEC: Bounds = { min: 0, max: 86400 };

function validateActuator(actuator: ActuatorSpec, field: string, errors: ValidationError[], warnings: ValidationWarning[]): void {
  checkEntityBounds(actuator, field, 'minIntervalSec', actuator.minIntervalSec, ACTUATOR_LIMITS.minIntervalSec, errors, warnings);
  checkEntityBounds(actuator, field, 'maxRuntimeSec', actuator.maxRuntimeSec, ACTUATOR_LIMITS.maxRuntimeSec, errors, warnings);
  checkEntityBounds(actuator, field, 'runtimeWindowSec', actuator.runtimeWindowSec, ACTUATOR_LIMITS.runtimeWindowSec, errors, warnings);
  checkEntityBounds(actuator, field, 'maxPulseSec', actuator.maxPulseSec, ACTUATOR_LIMITS.maxPulseSec, errors, warnings);
  checkEntityBounds(actuator, field, 'maxOnSec', actuator.maxOnSec, ACTUATOR_LIMITS.maxOnSec, errors, warnings);

  if (actuator.maxRuntimeSec > actuator.runtimeWindowSec) {
    addError(errors, field + '.maxRuntimeSec', 'maxRuntimeSec must not exceed runtimeWindowSec');
  }
  if (actuator.maxPulseSec > actuator.maxRuntimeSec) {
    addWarning(warnings, field + '.maxPulseSec', 'maxPulseSec exceeds maxRuntimeSec; pulses are limited by the runtime budget');
  }
}

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

function validateThresholdRule(
  rule: ThresholdRuleSpec,
  field: string,
  sensors: readonly SensorSpec[],
  actuator: ActuatorSpec | undefined,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const sensor = sensors.find(function(s) { return s.id === rule.sensorId; });
  if (!sensor) {
    addError(errors, field + '.sensorId', 'Unknown sensor "' + rule.sensorId + '"');
  }

  if (rule.direction === 'above' && !(rule.offAt < rule.onAt)) {
    addError(errors, field + '.offAt', "offAt must be below onAt for direction 'above'");
  }
  if (rule.direction === 'below' && !(rule.offAt > rule.onAt)) {
    addError(errors, field + '.offAt', "offAt must be above onAt for direction 'below'");
  }

  if (sensor && (rule.onAt < sensor.min || rule.onAt > sensor.max)) {
    addWarning(warnings, field + '.onAt', 'onAt is outside the plausible range of ' + sensor.id + '; the rule can never engage');
  }

  if (rule.action.type === 'pulse') {
    checkEntityBounds(rule, field + '.action', 'durationSec', rule.action.durationSec, DURATION_SEC, errors, warnings);
    if (actuator && rule.action.durationSec > actuator.maxPulseSec) {
      addWarning(warnings, field + '.action.durationSec', 'Pulse longer than maxPulseSec of ' + actuator.id + '; it will be clamped');
    }
  }
}

function validateRules(
  rules: readonly RuleSpec[],
  sensors: readonly SensorSpec[],
  actuators: readonly ActuatorSpec[],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  collectIds(rules, 'RULES', errors);
  const firstRuleFor = new Map<string, string>();

  for (let i = 0; i < rules.length; i++) {
    const rule = rules[i];
    const field = 'RULES[' + i + ']';
    const actuator = actuators.find(function(a) { return a.id === rule.actuatorId; });

    if (!actuator) {
      addError(errors, field + '.actuatorId', 'Unknown actuator "' + rule.actuatorId + '"');
    }
    checkEntityBounds(rule, field, 'cooldownSec', rule.cooldownSec, COOLDOWN_SEC, errors, warnings);

    if (rule.type === 'threshold') {
      validateThresholdRule(rule, field, sensors, actuator, errors, warnings);
    } else {
      const from = parseTimeOfDay(rule.from);
      const to = parseTimeOfDay(rule.to);
      if (from === null) {
        addError(errors, field + '.from', 'Expected HH:MM (got "' + rule.from + '")');
      }
      if (to === null) {
        addError(errors, field + '.to', 'Expected HH:MM (got "' + rule.to + '")');
      }
      if (from !== null && from === to) {
        addError(errors, field + '.to', 'Window must not be empty (from equals to)');
      }
    }

    const earlier = firstRuleFor.get(rule.actuatorId);
    if (earlier !== undefined) {
      addWarning(warnings, field, 'Rule ' + rule.id + ' shares actuator ' + rule.actuatorId + ' with ' + earlier + '; the later rule wins each tick');
    } else {
      firstRuleFor.set(rule.actuatorId, rule.id);
    }
  }
}

function validateButtons(
  buttons: readonly ButtonSpec[],
  actuatorIds: Set<string>,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  collectIds(buttons, 'BUTTONS', errors);

  for (let i = 0; i < buttons.length; i++) {
    const button = buttons[i];
    const field = 'BUTTONS[' + i + ']';

    if (button.activity.trim() === '') {
      addError(errors, field + '.activity', 'activity must not be empty');
    }
    if (!button.command) continue;

    if (!actuatorIds.has(button.command.actuatorId)) {
      addError(errors, field + '.command.actuatorId', 'Unknown actuator "' + button.command.actuatorId + '"');
    }
    if (button.command.action.type === 'pulse') {
      checkEntityBounds(button, field + '.command.action', 'durationSec', button.command.action.durationSec, DURATION_SEC, errors, warnings);
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a complete configuration
 * @param config - Parsed configuration
 * @returns Validation result with every error and warning found
 */
export function validateConfig(config: GrowConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateSettings(config, errors, warnings);

  collectIds(config.SENSORS, 'SENSORS', errors);
  for (let i = 0; i < config.SENSORS.length; i++) {
    validateSensor(config.SENSORS[i], 'SENSORS[' + i + ']', errors);
  }

  const actuatorIds = collectIds(config.ACTUATORS, 'ACTUATORS', errors);
  for (let i = 0; i < config.ACTUATORS.length; i++) {
    validateActuator(config.ACTUATORS[i], 'ACTUATORS[' + i + ']', errors, warnings);
  }
  if (config.ACTUATORS.length === 0) {
    addWarning(warnings, 'ACTUATORS', 'No actuators configured; the loop will only observe');
  }

  validateRules(config.RULES, config.SENSORS, config.ACTUATORS, errors, warnings);
  validateButtons(config.BUTTONS, actuatorIds, errors, warnings);

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
