/**
 * Configuration loading
 *
 * Reads the JSON configuration file, applies environment overrides (.env is
 * loaded through dotenv) and reports every type error it finds. Range and
 * consistency checks are left to the validator.
 */

import { readFile } from 'node:fs/promises';
import dotenv from 'dotenv';

import { ConfigInvalidError } from '$types';
import type {
  ActuatorSpec,
  ButtonSpec,
  GrowConfig,
  GrowUserConfig,
  HumanActionSpec,
  RuleActionSpec,
  RuleSpec,
  SensorKind,
  SensorSpec
} from '$types';
import { isLogLevel } from '@logging';
import type { LogLevel } from '@logging';
import { isFiniteNumber } from '@utils/number';
import { addError, addWarning, validateConfig } from '@validation';
import type { ValidationError, ValidationResult, ValidationWarning } from '@validation';
import { APP_CONSTANTS, USER_CONFIG } from './config';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface ParseResult {
  config: GrowConfig;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

const SENSOR_KINDS: readonly SensorKind[] = ['temperature', 'humidity', 'moisture', 'light'];

const LOG_LEVEL_NAMES: Readonly<Record<string, LogLevel>> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

// ═══════════════════════════════════════════════════════════════
// READERS
// ═══════════════════════════════════════════════════════════════

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSensorKind(value: unknown): value is SensorKind {
  for (let i = 0; i < SENSOR_KINDS.length; i++) {
    if (SENSOR_KINDS[i] === value) return true;
  }
  return false;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function readNumber(obj: Record<string, unknown>, key: string, field: string, fallback: number, errors: ValidationError[]): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!isFiniteNumber(value)) {
    addError(errors, field, field + ' must be a number (got ' + describeType(value) + ')');
    return fallback;
  }
  return value;
}

function readString(obj: Record<string, unknown>, key: string, field: string, fallback: string, errors: ValidationError[]): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    addError(errors, field, field + ' must be a string (got ' + describeType(value) + ')');
    return fallback;
  }
  return value;
}

function readBoolean(obj: Record<string, unknown>, key: string, field: string, fallback: boolean, errors: ValidationError[]): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    addError(errors, field, field + ' must be a boolean (got ' + describeType(value) + ')');
    return fallback;
  }
  return value;
}

function readLogLevel(obj: Record<string, unknown>, key: string, fallback: LogLevel, errors: ValidationError[]): LogLevel {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!isLogLevel(value)) {
    addError(errors, key, key + ' must be one of 0, 1, 2, 3 (got ' + String(value) + ')');
    return fallback;
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, field: string, errors: ValidationError[]): string | null {
  const value = obj[key];
  if (typeof value !== 'string') {
    addError(errors, field + '.' + key, key + ' is required and must be a string');
    return null;
  }
  return value;
}

function requireNumber(obj: Record<string, unknown>, key: string, field: string, errors: ValidationError[]): number | null {
  const value = obj[key];
  if (!isFiniteNumber(value)) {
    addError(errors, field + '.' + key, key + ' is required and must be a number');
    return null;
  }
  return value;
}

function readList<T>(
  obj: Record<string, unknown>,
  key: string,
  fallback: readonly T[],
  parseItem: (raw: unknown, field: string, errors: ValidationError[]) => T | null,
  errors: ValidationError[]
): readonly T[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    addError(errors, key, key + ' must be an array (got ' + describeType(value) + ')');
    return fallback;
  }

  const items: T[] = [];
  for (let i = 0; i < value.length; i++) {
    const item = parseItem(value[i], key + '[' + i + ']', errors);
    if (item !== null) {
      items.push(item);
    }
  }
  return items;
}

// ═══════════════════════════════════════════════════════════════
// REGISTRY ENTRIES
// ═══════════════════════════════════════════════════════════════

function parseSensor(raw: unknown, field: string, errors: ValidationError[]): SensorSpec | null {
  if (!isRecord(raw)) {
    addError(errors, field, 'Expected an object');
    return null;
  }
  const id = requireString(raw, 'id', field, errors);
  const unit = requireString(raw, 'unit', field, errors);
  const min = requireNumber(raw, 'min', field, errors);
  const max = requireNumber(raw, 'max', field, errors);
  const kind = raw.kind;
  if (!isSensorKind(kind)) {
    addError(errors, field + '.kind', 'kind must be one of ' + SENSOR_KINDS.join(', '));
    return null;
  }
  if (id === null || unit === null || min === null || max === null) return null;
  return { id: id, kind: kind, unit: unit, min: min, max: max };
}

function parseActuator(raw: unknown, field: string, errors: ValidationError[]): ActuatorSpec | null {
  if (!isRecord(raw)) {
    addError(errors, field, 'Expected an object');
    return null;
  }
  const id = requireString(raw, 'id', field, errors);
  const minIntervalSec = requireNumber(raw, 'minIntervalSec', field, errors);
  const maxRuntimeSec = requireNumber(raw, 'maxRuntimeSec', field, errors);
  const runtimeWindowSec = requireNumber(raw, 'runtimeWindowSec', field, errors);
  const maxPulseSec = requireNumber(raw, 'maxPulseSec', field, errors);
  const maxOnSec = requireNumber(raw, 'maxOnSec', field, errors);
  if (id === null || minIntervalSec === null || maxRuntimeSec === null ||
      runtimeWindowSec === null || maxPulseSec === null || maxOnSec === null) {
    return null;
  }
  return {
    id: id,
    minIntervalSec: minIntervalSec,
    maxRuntimeSec: maxRuntimeSec,
    runtimeWindowSec: runtimeWindowSec,
    maxPulseSec: maxPulseSec,
    maxOnSec: maxOnSec
  };
}

function parseRuleAction(raw: unknown, field: string, errors: ValidationError[]): RuleActionSpec | null {
  if (!isRecord(raw)) {
    addError(errors, field, 'Expected an object');
    return null;
  }
  if (raw.type === 'on') {
    return { type: 'on' };
  }
  if (raw.type === 'pulse') {
    const durationSec = requireNumber(raw, 'durationSec', field, errors);
    return durationSec === null ? null : { type: 'pulse', durationSec: durationSec };
  }
  addError(errors, field + '.type', "type must be 'on' or 'pulse'");
  return null;
}

function parseHumanAction(raw: unknown, field: string, errors: ValidationError[]): HumanActionSpec | null {
  if (isRecord(raw) && raw.type === 'off') {
    return { type: 'off' };
  }
  if (isRecord(raw) && raw.type !== 'on' && raw.type !== 'pulse') {
    addError(errors, field + '.type', "type must be 'on', 'off' or 'pulse'");
    return null;
  }
  return parseRuleAction(raw, field, errors);
}

function parseRule(raw: unknown, field: string, errors: ValidationError[]): RuleSpec | null {
  if (!isRecord(raw)) {
    addError(errors, field, 'Expected an object');
    return null;
  }
  const id = requireString(raw, 'id', field, errors);
  const actuatorId = requireString(raw, 'actuatorId', field, errors);
  const cooldownSec = readNumber(raw, 'cooldownSec', field + '.cooldownSec', 0, errors);

  if (raw.type === 'time_window') {
    const from = requireString(raw, 'from', field, errors);
    const to = requireString(raw, 'to', field, errors);
    if (id === null || actuatorId === null || from === null || to === null) return null;
    return { id: id, type: 'time_window', actuatorId: actuatorId, from: from, to: to, cooldownSec: cooldownSec };
  }

  if (raw.type !== 'threshold') {
    addError(errors, field + '.type', "type must be 'threshold' or 'time_window'");
    return null;
  }

  const sensorId = requireString(raw, 'sensorId', field, errors);
  const onAt = requireNumber(raw, 'onAt', field, errors);
  const offAt = requireNumber(raw, 'offAt', field, errors);
  const direction = raw.direction;
  if (direction !== 'above' && direction !== 'below') {
    addError(errors, field + '.direction', "direction must be 'above' or 'below'");
    return null;
  }
  const action = parseRuleAction(raw.action === undefined ? { type: 'on' } : raw.action, field + '.action', errors);
  if (id === null || actuatorId === null || sensorId === null || onAt === null || offAt === null || action === null) {
    return null;
  }
  return {
    id: id,
    type: 'threshold',
    actuatorId: actuatorId,
    sensorId: sensorId,
    direction: direction,
    onAt: onAt,
    offAt: offAt,
    action: action,
    cooldownSec: cooldownSec
  };
}

function parseButton(raw: unknown, field: string, errors: ValidationError[]): ButtonSpec | null {
  if (!isRecord(raw)) {
    addError(errors, field, 'Expected an object');
    return null;
  }
  const id = requireString(raw, 'id', field, errors);
  const activity = readString(raw, 'activity', field + '.activity', 'button_press', errors);
  if (id === null) return null;

  if (raw.command === undefined) {
    return { id: id, activity: activity };
  }
  if (!isRecord(raw.command)) {
    addError(errors, field + '.command', 'Expected an object');
    return null;
  }
  const actuatorId = requireString(raw.command, 'actuatorId', field + '.command', errors);
  const action = parseHumanAction(raw.command.action, field + '.command.action', errors);
  if (actuatorId === null || action === null) return null;
  return { id: id, activity: activity, command: { actuatorId: actuatorId, action: action } };
}

// ═══════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════

function envNumber(env: EnvSource, key: string, fallback: number, errors: ValidationError[]): number {
  const text = env[key];
  if (text === undefined || text.trim() === '') return fallback;
  const value = Number(text);
  if (!Number.isFinite(value)) {
    addError(errors, key, key + ' from environment is not a number ("' + text + '")');
    return fallback;
  }
  return value;
}

function envLogLevel(env: EnvSource, key: string, fallback: LogLevel, errors: ValidationError[]): LogLevel {
  const text = env[key];
  if (text === undefined || text.trim() === '') return fallback;
  const upper = text.trim().toUpperCase();
  if (Object.prototype.hasOwnProperty.call(LOG_LEVEL_NAMES, upper)) {
    return LOG_LEVEL_NAMES[upper];
  }
  const numeric = Number(upper);
  if (isLogLevel(numeric)) {
    return numeric;
  }
  addError(errors, key, key + ' from environment must be DEBUG, INFO, WARNING, CRITICAL or 0-3 ("' + text + '")');
  return fallback;
}

function envBoolean(env: EnvSource, key: string, fallback: boolean, errors: ValidationError[]): boolean {
  const text = env[key];
  if (text === undefined || text.trim() === '') return fallback;
  const lower = text.trim().toLowerCase();
  if (lower === 'true' || lower === '1') return true;
  if (lower === 'false' || lower === '0') return false;
  addError(errors, key, key + ' from environment must be true or false ("' + text + '")');
  return fallback;
}

/**
 * Apply environment overrides to parsed settings
 * @param base - Settings from defaults and file
 * @param env - Environment variables
 * @param errors - Array to append errors to
 * @returns Settings with overrides applied
 */
export function applyEnvironment(base: GrowUserConfig, env: EnvSource, errors: ValidationError[]): GrowUserConfig {
  return {
    ...base,
    TICK_PERIOD_MS: envNumber(env, 'TICK_PERIOD_MS', base.TICK_PERIOD_MS, errors),
    SAMPLE_PERIOD_SEC: envNumber(env, 'SAMPLE_PERIOD_SEC', base.SAMPLE_PERIOD_SEC, errors),
    GLOBAL_LOG_LEVEL: envLogLevel(env, 'GLOBAL_LOG_LEVEL', base.GLOBAL_LOG_LEVEL, errors),
    CONSOLE_LOG_LEVEL: envLogLevel(env, 'CONSOLE_LOG_LEVEL', base.CONSOLE_LOG_LEVEL, errors),
    SLACK_ENABLED: envBoolean(env, 'SLACK_ENABLED', base.SLACK_ENABLED, errors),
    SLACK_WEBHOOK_URL: env.SLACK_WEBHOOK_URL !== undefined ? env.SLACK_WEBHOOK_URL.trim() : base.SLACK_WEBHOOK_URL,
    EVENT_LOG_PATH: env.EVENT_LOG_PATH !== undefined ? env.EVENT_LOG_PATH.trim() : base.EVENT_LOG_PATH
  };
}

// ═══════════════════════════════════════════════════════════════
// DOCUMENT
// ═══════════════════════════════════════════════════════════════

/**
 * Parse a configuration document
 *
 * Missing keys fall back to the defaults in config.ts. Unknown keys are
 * reported as warnings. Type errors are collected, never thrown.
 *
 * @param document - Parsed JSON value
 * @param env - Environment variables used for overrides
 * @returns Merged configuration plus type errors and warnings
 */
export function parseConfigDocument(document: unknown, env: EnvSource): ParseResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  let doc: Record<string, unknown> = {};

  if (isRecord(document)) {
    doc = document;
  } else {
    addError(errors, '$', 'Configuration must be a JSON object (got ' + describeType(document) + ')');
  }

  const keys = Object.keys(doc);
  for (let i = 0; i < keys.length; i++) {
    if (!Object.prototype.hasOwnProperty.call(USER_CONFIG, keys[i])) {
      addWarning(warnings, keys[i], 'Unknown setting ' + keys[i] + ' is ignored');
    }
  }

  const d = USER_CONFIG;
  const fromFile: GrowUserConfig = {
    TICK_PERIOD_MS: readNumber(doc, 'TICK_PERIOD_MS', 'TICK_PERIOD_MS', d.TICK_PERIOD_MS, errors),
    SAMPLE_PERIOD_SEC: readNumber(doc, 'SAMPLE_PERIOD_SEC', 'SAMPLE_PERIOD_SEC', d.SAMPLE_PERIOD_SEC, errors),
    SENSOR_TIMEOUT_MS: readNumber(doc, 'SENSOR_TIMEOUT_MS', 'SENSOR_TIMEOUT_MS', d.SENSOR_TIMEOUT_MS, errors),
    ACTUATOR_TIMEOUT_MS: readNumber(doc, 'ACTUATOR_TIMEOUT_MS', 'ACTUATOR_TIMEOUT_MS', d.ACTUATOR_TIMEOUT_MS, errors),
    INPUT_TIMEOUT_MS: readNumber(doc, 'INPUT_TIMEOUT_MS', 'INPUT_TIMEOUT_MS', d.INPUT_TIMEOUT_MS, errors),
    SENSOR_DEGRADED_AFTER: readNumber(doc, 'SENSOR_DEGRADED_AFTER', 'SENSOR_DEGRADED_AFTER', d.SENSOR_DEGRADED_AFTER, errors),
    SESSION_GRACE_SEC: readNumber(doc, 'SESSION_GRACE_SEC', 'SESSION_GRACE_SEC', d.SESSION_GRACE_SEC, errors),
    DEFAULT_PARTICIPANT: readString(doc, 'DEFAULT_PARTICIPANT', 'DEFAULT_PARTICIPANT', d.DEFAULT_PARTICIPANT, errors),
    INPUT_DEBOUNCE_MS: readNumber(doc, 'INPUT_DEBOUNCE_MS', 'INPUT_DEBOUNCE_MS', d.INPUT_DEBOUNCE_MS, errors),
    INPUT_QUEUE_SIZE: readNumber(doc, 'INPUT_QUEUE_SIZE', 'INPUT_QUEUE_SIZE', d.INPUT_QUEUE_SIZE, errors),
    EVENT_QUEUE_SIZE: readNumber(doc, 'EVENT_QUEUE_SIZE', 'EVENT_QUEUE_SIZE', d.EVENT_QUEUE_SIZE, errors),
    EVENT_DRAIN_INTERVAL_MS: readNumber(doc, 'EVENT_DRAIN_INTERVAL_MS', 'EVENT_DRAIN_INTERVAL_MS', d.EVENT_DRAIN_INTERVAL_MS, errors),
    EVENT_LOG_PATH: readString(doc, 'EVENT_LOG_PATH', 'EVENT_LOG_PATH', d.EVENT_LOG_PATH, errors),
    SENSORS: readList(doc, 'SENSORS', d.SENSORS, parseSensor, errors),
    ACTUATORS: readList(doc, 'ACTUATORS', d.ACTUATORS, parseActuator, errors),
    RULES: readList(doc, 'RULES', d.RULES, parseRule, errors),
    BUTTONS: readList(doc, 'BUTTONS', d.BUTTONS, parseButton, errors),
    SLACK_ENABLED: readBoolean(doc, 'SLACK_ENABLED', 'SLACK_ENABLED', d.SLACK_ENABLED, errors),
    SLACK_LOG_LEVEL: readLogLevel(doc, 'SLACK_LOG_LEVEL', d.SLACK_LOG_LEVEL, errors),
    SLACK_WEBHOOK_URL: readString(doc, 'SLACK_WEBHOOK_URL', 'SLACK_WEBHOOK_URL', d.SLACK_WEBHOOK_URL, errors),
    SLACK_BUFFER_SIZE: readNumber(doc, 'SLACK_BUFFER_SIZE', 'SLACK_BUFFER_SIZE', d.SLACK_BUFFER_SIZE, errors),
    SLACK_RETRY_DELAY_SEC: readNumber(doc, 'SLACK_RETRY_DELAY_SEC', 'SLACK_RETRY_DELAY_SEC', d.SLACK_RETRY_DELAY_SEC, errors),
    CONSOLE_ENABLED: readBoolean(doc, 'CONSOLE_ENABLED', 'CONSOLE_ENABLED', d.CONSOLE_ENABLED, errors),
    CONSOLE_LOG_LEVEL: readLogLevel(doc, 'CONSOLE_LOG_LEVEL', d.CONSOLE_LOG_LEVEL, errors),
    CONSOLE_BUFFER_SIZE: readNumber(doc, 'CONSOLE_BUFFER_SIZE', 'CONSOLE_BUFFER_SIZE', d.CONSOLE_BUFFER_SIZE, errors),
    CONSOLE_INTERVAL_MS: readNumber(doc, 'CONSOLE_INTERVAL_MS', 'CONSOLE_INTERVAL_MS', d.CONSOLE_INTERVAL_MS, errors),
    GLOBAL_LOG_LEVEL: readLogLevel(doc, 'GLOBAL_LOG_LEVEL', d.GLOBAL_LOG_LEVEL, errors),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readNumber(doc, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', d.GLOBAL_LOG_AUTO_DEMOTE_HOURS, errors)
  };

  const user = applyEnvironment(fromFile, env, errors);

  return {
    config: { ...user, ...APP_CONSTANTS },
    errors: errors,
    warnings: warnings
  };
}

/**
 * Parse and validate a configuration document
 * @param document - Parsed JSON value
 * @param env - Environment variables
 * @returns Configuration and the combined type, range and consistency report
 */
export function checkConfigDocument(document: unknown, env: EnvSource): { config: GrowConfig; result: ValidationResult } {
  const parsed = parseConfigDocument(document, env);
  const validation = validateConfig(parsed.config);
  const errors = parsed.errors.concat(validation.errors);
  return {
    config: parsed.config,
    result: {
      valid: errors.length === 0,
      errors: errors,
      warnings: parsed.warnings.concat(validation.warnings)
    }
  };
}

/**
 * Read a JSON configuration file
 * @param path - File path
 * @returns Parsed JSON value
 * @throws ConfigInvalidError when the file cannot be read or is not JSON
 */
export async function readConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigInvalidError([{ field: '$', message: 'Cannot read ' + path + ': ' + (err instanceof Error ? err.message : String(err)) }]);
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (err) {
    throw new ConfigInvalidError([{ field: '$', message: path + ' is not valid JSON: ' + (err instanceof Error ? err.message : String(err)) }]);
  }
}

/**
 * Load .env into process.env
 * Existing environment variables take precedence over the file.
 */
export function loadEnvironmentFile(): void {
  dotenv.config();
}

/**
 * Load, override and validate the configuration, refusing invalid input
 * @param path - Configuration file
 * @param env - Environment variables
 * @returns Validated configuration and its warnings
 * @throws ConfigInvalidError carrying every error found
 */
export async function loadConfig(path: string, env: EnvSource): Promise<{ config: GrowConfig; warnings: ValidationWarning[] }> {
  const document = await readConfigFile(path);
  const checked = checkConfigDocument(document, env);
  if (!checked.result.valid) {
    throw new ConfigInvalidError(checked.result.errors);
  }
  return { config: checked.config, warnings: checked.result.warnings };
}
