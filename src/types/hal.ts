/**
 * Capability interfaces for the devices the control core talks to
 *
 * Real drivers (GPIO, I2C, 1-Wire, relay boards) live behind these interfaces
 * and are supplied at startup. The core never inspects a device beyond them.
 */

import type { SensorKind } from './common';

/**
 * Raw result of a single sensor read, before normalisation
 */
export interface RawSensorValue {
  value: number;
  unit: string;
  /** False when the driver itself knows the value is unusable */
  valid: boolean;
}

/**
 * A registered sensor
 */
export interface SensorSource {
  readonly id: string;
  readonly kind: SensorKind;
  /**
   * Read the sensor
   * Callers bound this with their own timeout; a rejection counts as an invalid read.
   */
  read(): Promise<RawSensorValue>;
}

/**
 * Actuator output (relay board, smart plug, pump driver)
 */
export interface ActuatorSink {
  /**
   * Drive an actuator on or off
   * Resolves once the device accepted the change, rejects on failure.
   */
  set(actuatorId: string, on: boolean): Promise<void>;
}

/**
 * Boolean physical input (emergency stop, override key switch, pressure mat)
 */
export interface DigitalInput {
  read(): Promise<boolean>;
}

/**
 * Timer API
 * Same shape as the scheduler the loop runs on, so tests can drive time by hand
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   * @returns Timer handle for clear()
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): number;

  /** Cancel a timer (no-op for unknown handles) */
  clear(timerId: number): void;
}
