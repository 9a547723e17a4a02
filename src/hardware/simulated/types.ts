/**
 * Simulated greenhouse type definitions
 */

import type { ActuatorSink, DigitalInput, SensorKind, SensorSource, SensorSpec } from '$types';
import type { Logger } from '@logging';

/**
 * Current physical conditions, one value per sensor kind in canonical units
 */
export type Conditions = Record<SensorKind, number>;

/**
 * What a running actuator does to one quantity
 * perSecond is added every simulated second while the actuator is on.
 */
export interface ActuatorEffect {
  kind: SensorKind;
  perSecond: number;
}

export type EffectTable = Readonly<Record<string, readonly ActuatorEffect[]>>;

/**
 * Digital input an operator can flip by hand
 */
export interface SwitchInput extends DigitalInput {
  set(value: boolean): void;
  get(): boolean;
}

export interface GreenhouseOptions {
  /** Current time (ms) */
  clock: () => number;
  logger: Logger;
  /** Uniform [0, 1) source for sensor noise */
  random?: () => number;
  effects?: EffectTable;
  initial?: Partial<Conditions>;
}

export interface SimulatedGreenhouse {
  /** One source per registered sensor, reading the conditions of its kind */
  sensors(specs: readonly SensorSpec[]): SensorSource[];
  sink: ActuatorSink;
  estop: SwitchInput;
  override: SwitchInput;
  presence: SwitchInput;
  /** Integrate the model up to a point in time */
  advanceTo(now: number): void;
  conditions(): Readonly<Conditions>;
  isOn(actuatorId: string): boolean;
}
