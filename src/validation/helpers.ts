/**
 * Validation helpers
 * Issue builders and bounds checks shared by the scalar settings and the registry
 */

import { isFiniteNumber } from '@utils/number';
import type { Bounds, ValidationError, ValidationWarning } from './types';

export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ field: field, message: message });
}

export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ field: field, message: message });
}

/**
 * Check a value against its bounds
 *
 * label starts each message: the setting name for scalar settings,
 * "<id>: <key>" for a registry entry or rule.
 *
 * @param value - Value to check
 * @param field - Document path the issue is filed under
 * @param label - Subject of the message
 * @param bounds - Hard and recommended limits
 * @param errors - Receives hard-limit violations
 * @param warnings - Receives recommendation violations
 * @returns true when no error was added
 */
export function checkBounds(
  value: number,
  field: string,
  label: string,
  bounds: Bounds,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): boolean {
  if (bounds.integer === true && isFiniteNumber(value) && !Number.isInteger(value)) {
    addError(errors, field, label + ' must be an integer (got ' + value + ')');
    return false;
  }
  if (!isFiniteNumber(value) || value < bounds.min || value > bounds.max) {
    addError(errors, field, label + ' must be between ' + bounds.min + ' and ' + bounds.max + ' (got ' + value + ')');
    return false;
  }

  const recommended = bounds.recommended;
  if (recommended !== undefined && (value < recommended[0] || value > recommended[1])) {
    addWarning(warnings, field, label + ' is outside the recommended ' + recommended[0] + '-' + recommended[1] + ' (got ' + value + ')');
  }
  return true;
}

/**
 * Check one numeric property of a registry entry or rule, naming the entity
 * @param entity - Entry the property belongs to
 * @param path - Document path of the entry, e.g. "ACTUATORS[1]"
 * @param key - Property name
 * @param value - Property value
 * @param bounds - Accepted range
 * @param errors - Receives hard-limit violations
 * @param warnings - Receives recommendation violations
 */
export function checkEntityBounds(
  entity: { readonly id: string },
  path: string,
  key: string,
  value: number,
  bounds: Bounds,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  checkBounds(value, path + '.' + key, entity.id + ': ' + key, bounds, errors, warnings);
}
