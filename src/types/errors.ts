/**
 * Error types for the control core
 *
 * Recovery policy per type:
 * - SensorTimeoutError / SensorInvalidError: recovered locally, reading marked invalid
 * - ActuatorRejectedError: recovered, outcome logged, no retry until a later tick asks again
 * - SafetyFaultError: treated exactly like an asserted emergency stop
 * - ConfigInvalidError: fatal at startup, the loop refuses to start
 */

import type { ConfigIssue } from '@validation/types';

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the configuration is inconsistent
 * Carries every issue found so an operator can fix them in one pass
 */
export class ConfigInvalidError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      'Invalid configuration (' + issues.length + ' error' + (issues.length === 1 ? '' : 's') + '): ' +
      issues.map(function(issue) { return issue.field + ': ' + issue.message; }).join('; ')
    );
    this.name = 'ConfigInvalidError';
    this.issues = issues;
  }
}

/**
 * Error thrown when an I/O call does not settle within its bound
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Error raised when a sensor does not answer within SENSOR_TIMEOUT_MS
 */
export class SensorTimeoutError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, timeoutMs: number) {
    super('Sensor ' + sourceId + ' did not answer within ' + timeoutMs + 'ms');
    this.name = 'SensorTimeoutError';
    this.sourceId = sourceId;
  }
}

/**
 * Error raised when a sensor answers with an unusable value
 */
export class SensorInvalidError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, detail: string) {
    super('Sensor ' + sourceId + ' returned an invalid reading: ' + detail);
    this.name = 'SensorInvalidError';
    this.sourceId = sourceId;
  }
}

/**
 * Error raised when an actuator driver refuses or fails a command
 */
export class ActuatorRejectedError extends Error {
  readonly actuatorId: string;

  constructor(actuatorId: string, detail: string) {
    super('Actuator ' + actuatorId + ' rejected command: ' + detail);
    this.name = 'ActuatorRejectedError';
    this.actuatorId = actuatorId;
  }
}

/**
 * Error raised when a safety input cannot be read
 */
export class SafetyFaultError extends Error {
  readonly input: string;

  constructor(input: string, detail: string) {
    super('Safety input ' + input + ' unreadable: ' + detail);
    this.name = 'SafetyFaultError';
    this.input = input;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
