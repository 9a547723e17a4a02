/**
 * Sensor helper functions
 *
 * Pure normalisation: unit aliases, Fahrenheit conversion, rounding and the
 * plausible-range check against the registry entry.
 */

import type { RawSensorValue, SensorSpec } from '$types';
import { isFiniteNumber, roundTo } from '@utils/number';
import type { NormalizedValue } from './types';

const UNIT_ALIASES: Readonly<Record<string, string>> = {
  'c': 'C',
  '°c': 'C',
  'degc': 'C',
  'celsius': 'C',
  'f': 'F',
  '°f': 'F',
  'degf': 'F',
  'fahrenheit': 'F',
  '%': '%',
  '%rh': '%',
  'rh': '%',
  'percent': '%',
  'lx': 'lux',
  'lux': 'lux'
};

/**
 * Map a driver's unit string onto its canonical spelling
 * @param unit - Unit as reported
 * @returns Canonical unit, or the trimmed input when unknown
 */
export function canonicalUnit(unit: string): string {
  const key = unit.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(UNIT_ALIASES, key)) {
    return UNIT_ALIASES[key];
  }
  return unit.trim();
}

/**
 * Convert Fahrenheit to Celsius
 * @param value - Temperature in °F
 * @returns Temperature in °C
 */
export function fahrenheitToCelsius(value: number): number {
  return (value - 32) * 5 / 9;
}

/**
 * Check a value against the registered plausible range
 * @param value - Normalised value
 * @param spec - Registry entry
 * @returns True if min <= value <= max
 */
export function isWithinRange(value: number, spec: SensorSpec): boolean {
  return value >= spec.min && value <= spec.max;
}

/**
 * Normalise a raw read for a registered sensor
 * @param raw - Value as returned by the driver
 * @param spec - Registry entry (expected unit and range)
 * @returns Normalised value, or the reason it is unusable
 */
export function normalizeReading(raw: RawSensorValue, spec: SensorSpec): NormalizedValue {
  const rawValue: unknown = raw.value;
  if (!isFiniteNumber(rawValue)) {
    return { valid: false, value: null, unit: spec.unit, error: 'non-finite value' };
  }

  let value = rawValue;
  let unit = canonicalUnit(raw.unit);
  if (unit === 'F' && spec.unit === 'C') {
    value = fahrenheitToCelsius(value);
    unit = 'C';
  }
  value = roundTo(value, 2);

  if (!raw.valid) {
    return { valid: false, value: value, unit: unit, error: 'source flagged the value invalid' };
  }
  if (unit !== spec.unit) {
    return { valid: false, value: value, unit: unit, error: 'unexpected unit ' + unit + ' (expected ' + spec.unit + ')' };
  }
  if (!isWithinRange(value, spec)) {
    return { valid: false, value: value, unit: unit, error: value + unit + ' outside ' + spec.min + '..' + spec.max };
  }

  return { valid: true, value: value, unit: unit };
}
