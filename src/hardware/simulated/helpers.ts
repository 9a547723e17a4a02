/**
 * Greenhouse model
 *
 * Every quantity relaxes towards an ambient target that follows the
 * day/night cycle; running actuators push it away at a fixed rate.
 */

import type { SensorKind } from '$types';
import { isWithinWindow } from '@utils/time';
import type { ActuatorEffect, Conditions, EffectTable } from './types';

export const GREENHOUSE_MODEL = {
  START: { temperature: 22, humidity: 65, moisture: 45, light: 0 },

  DAY_START_MINUTE: 360,
  DAY_END_MINUTE: 1080,
  DAY_TEMPERATURE: 26,
  NIGHT_TEMPERATURE: 20,
  DAY_LIGHT: 800,
  /** Soil dries out towards this without watering */
  DRY_MOISTURE: 20,

  /** Fraction of the gap to the target closed per second */
  RELAX_PER_SEC: { temperature: 0.002, humidity: 0.005, moisture: 0.0005, light: 0.1 },
  /** Peak sensor noise either side of the true value */
  NOISE: { temperature: 0.1, humidity: 0.5, moisture: 0.3, light: 5 },
  BOUNDS: {
    temperature: [-10, 50],
    humidity: [0, 100],
    moisture: [0, 100],
    light: [0, 100000]
  }
} as const;

/**
 * Effects of the actuators a small grow room usually has, by actuator id
 */
export const DEFAULT_EFFECTS: EffectTable = {
  fan: [{ kind: 'temperature', perSecond: -0.02 }, { kind: 'humidity', perSecond: -0.05 }],
  heater: [{ kind: 'temperature', perSecond: 0.02 }],
  pump: [{ kind: 'moisture', perSecond: 0.5 }],
  humidifier: [{ kind: 'humidity', perSecond: 0.08 }],
  lights: [{ kind: 'light', perSecond: 1000 }]
};

const KINDS: readonly SensorKind[] = ['temperature', 'humidity', 'moisture', 'light'];

/**
 * Canonical unit the simulated drivers report per kind
 */
export const SIMULATED_UNITS: Readonly<Record<SensorKind, string>> = {
  temperature: 'C',
  humidity: '%',
  moisture: '%',
  light: 'lux'
};

export function isDaytime(minute: number): boolean {
  return isWithinWindow(minute, GREENHOUSE_MODEL.DAY_START_MINUTE, GREENHOUSE_MODEL.DAY_END_MINUTE);
}

/**
 * Targets the room drifts towards with every actuator off
 * Humidity falls as the room warms.
 */
export function ambientTargets(current: Readonly<Conditions>, daytime: boolean): Conditions {
  return {
    temperature: daytime ? GREENHOUSE_MODEL.DAY_TEMPERATURE : GREENHOUSE_MODEL.NIGHT_TEMPERATURE,
    humidity: 80 - (current.temperature - 20) * 3,
    moisture: GREENHOUSE_MODEL.DRY_MOISTURE,
    light: daytime ? GREENHOUSE_MODEL.DAY_LIGHT : 0
  };
}

/**
 * Collect the effects of the actuators that are on
 * @param running - Ids of the running actuators
 * @param table - Effects per actuator id; unknown ids have none
 */
export function activeEffects(running: Iterable<string>, table: EffectTable): ActuatorEffect[] {
  const effects: ActuatorEffect[] = [];
  for (const id of running) {
    const own = table[id];
    if (own !== undefined) {
      effects.push(...own);
    }
  }
  return effects;
}

function clamp(kind: SensorKind, value: number): number {
  const bounds = GREENHOUSE_MODEL.BOUNDS[kind];
  return Math.min(bounds[1], Math.max(bounds[0], value));
}

/**
 * Advance the conditions by a step of at most a few seconds
 *
 * @param current - Conditions at the start of the step
 * @param targets - Ambient targets
 * @param effects - Effects of the running actuators
 * @param seconds - Step length
 * @returns Conditions at the end of the step
 */
export function stepConditions(
  current: Readonly<Conditions>,
  targets: Readonly<Conditions>,
  effects: readonly ActuatorEffect[],
  seconds: number
): Conditions {
  const next: Conditions = { ...current };
  for (const kind of KINDS) {
    const relax = Math.min(1, GREENHOUSE_MODEL.RELAX_PER_SEC[kind] * seconds);
    next[kind] = current[kind] + (targets[kind] - current[kind]) * relax;
  }
  for (const effect of effects) {
    next[effect.kind] += effect.perSecond * seconds;
  }
  for (const kind of KINDS) {
    next[kind] = clamp(kind, next[kind]);
  }
  return next;
}

/**
 * Noise to add to a reading
 * @param kind - Quantity read
 * @param random - Uniform [0, 1) sample
 */
export function sensorNoise(kind: SensorKind, random: number): number {
  return (random * 2 - 1) * GREENHOUSE_MODEL.NOISE[kind];
}
