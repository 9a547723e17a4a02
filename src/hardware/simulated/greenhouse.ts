/**
 * Simulated greenhouse
 *
 * Stands in for the real drivers on the bench: sensors read a model that
 * drifts with the time of day and responds to the actuators the controller
 * switches; the safety and presence inputs are switches an operator flips.
 * The model is integrated lazily, whenever a device is touched.
 */

import type { RawSensorValue, SensorSource, SensorSpec } from '$types';
import { minuteOfDay } from '@utils/time';
import { DEFAULT_EFFECTS, GREENHOUSE_MODEL, SIMULATED_UNITS, activeEffects, ambientTargets, isDaytime, sensorNoise, stepConditions } from './helpers';
import type { Conditions, GreenhouseOptions, SimulatedGreenhouse, SwitchInput } from './types';

/**
 * Create a switch input
 * @param initial - Starting level
 */
export function createSwitchInput(initial = false): SwitchInput {
  let level = initial;
  return {
    read: function() { return Promise.resolve(level); },
    set: function(value: boolean) { level = value; },
    get: function() { return level; }
  };
}

/**
 * Create the simulated greenhouse
 * @param options - Clock, logger and model overrides
 * @returns Greenhouse with its sensors, actuator sink and inputs
 */
export function createSimulatedGreenhouse(options: GreenhouseOptions): SimulatedGreenhouse {
  const clock = options.clock;
  const logger = options.logger;
  const random = options.random ?? Math.random;
  const effects = options.effects ?? DEFAULT_EFFECTS;

  let conditions: Conditions = { ...GREENHOUSE_MODEL.START, ...options.initial };
  let modelTime = clock();
  const running = new Set<string>();

  function advanceTo(now: number): void {
    let remaining = (now - modelTime) / 1000;
    if (remaining <= 0) {
      return;
    }
    const effectsNow = activeEffects(running, effects);
    const daytime = isDaytime(minuteOfDay(now));
    while (remaining > 0) {
      const step = Math.min(1, remaining);
      conditions = stepConditions(conditions, ambientTargets(conditions, daytime), effectsNow, step);
      remaining -= step;
    }
    modelTime = now;
  }

  function sensors(specs: readonly SensorSpec[]): SensorSource[] {
    return specs.map(function(spec): SensorSource {
      return {
        id: spec.id,
        kind: spec.kind,
        read: function(): Promise<RawSensorValue> {
          advanceTo(clock());
          const value = conditions[spec.kind] + sensorNoise(spec.kind, random());
          return Promise.resolve({ value: value, unit: SIMULATED_UNITS[spec.kind], valid: true });
        }
      };
    });
  }

  function set(actuatorId: string, on: boolean): Promise<void> {
    // Integrate up to the switch so the old state covers the time before it
    advanceTo(clock());
    if (on) {
      running.add(actuatorId);
    } else {
      running.delete(actuatorId);
    }
    logger.debug('Simulated ' + actuatorId + ' switched ' + (on ? 'ON' : 'off'));
    return Promise.resolve();
  }

  return {
    sensors: sensors,
    sink: { set: set },
    estop: createSwitchInput(false),
    override: createSwitchInput(false),
    presence: createSwitchInput(false),
    advanceTo: advanceTo,
    conditions: function() { return conditions; },
    isOn: function(actuatorId: string) { return running.has(actuatorId); }
  };
}
