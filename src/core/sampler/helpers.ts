/**
 * Sampler helper functions
 */

import { ConfigInvalidError } from '$types';
import type { SensorSource, SensorSpec } from '$types';
import type { SensorReading } from '@events';
import type { ValidationError } from '@validation';
import type { RegisteredSensor, SourceHealthChange, SourceHealthState } from './types';

/**
 * Create healthy state for a source that has not been read yet
 */
export function createSourceHealth(): SourceHealthState {
  return { consecutiveFailures: 0, degradedFired: false, latest: null, lastValid: null };
}

/**
 * Update source health with one reading (mutates state in place)
 *
 * Degraded fires once, on the read that reaches `degradedAfter` consecutive
 * failures. Recovered fires once, on the first valid read after that.
 *
 * @param state - Source health to mutate
 * @param reading - Reading just taken
 * @param degradedAfter - Consecutive invalid reads that mark a source degraded
 * @returns Health change to report, or null
 */
export function updateSourceHealth(
  state: SourceHealthState,
  reading: SensorReading,
  degradedAfter: number
): SourceHealthChange {
  state.latest = reading;

  if (reading.valid) {
    state.lastValid = reading;
    state.consecutiveFailures = 0;
    if (state.degradedFired) {
      state.degradedFired = false;
      return 'recovered';
    }
    return null;
  }

  state.consecutiveFailures++;
  if (state.consecutiveFailures >= degradedAfter && !state.degradedFired) {
    state.degradedFired = true;
    return 'degraded';
  }
  return null;
}

/**
 * Join the configured sensor registry with the available drivers
 * @param specs - Registry entries from configuration
 * @param sources - Drivers supplied at startup
 * @returns Registered sensors in registry order
 * @throws ConfigInvalidError when a registry entry has no driver or the kinds differ
 */
export function buildSensorRegistry(specs: readonly SensorSpec[], sources: readonly SensorSource[]): RegisteredSensor[] {
  const byId = new Map<string, SensorSource>();
  for (const source of sources) {
    byId.set(source.id, source);
  }

  const issues: ValidationError[] = [];
  const registry: RegisteredSensor[] = [];
  for (const spec of specs) {
    const source = byId.get(spec.id);
    if (source === undefined) {
      issues.push({ field: 'SENSORS', message: 'No driver for sensor ' + spec.id });
      continue;
    }
    if (source.kind !== spec.kind) {
      issues.push({ field: 'SENSORS', message: 'Sensor ' + spec.id + ' is a ' + source.kind + ' source, configured as ' + spec.kind });
      continue;
    }
    registry.push({ source: source, spec: spec });
  }

  if (issues.length > 0) {
    throw new ConfigInvalidError(issues);
  }
  return registry;
}
