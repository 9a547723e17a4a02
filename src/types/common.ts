/**
 * Common type definitions used throughout the project
 */

/**
 * Physical quantity a sensor reports
 */
export type SensorKind = 'temperature' | 'humidity' | 'moisture' | 'light';

/**
 * Timestamp in milliseconds since the Unix epoch
 */
export type EpochMs = number;

/**
 * Last known value of a sensor - null when it has never produced a valid one
 */
export type MaybeValue = number | null;
