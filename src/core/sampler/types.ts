/**
 * Environment sampler type definitions
 */

import type { SensorSource, SensorSpec } from '$types';
import type { SensorReading } from '@events';

/**
 * Registry entry joined with its driver
 */
export interface RegisteredSensor {
  source: SensorSource;
  spec: SensorSpec;
}

/**
 * Per-source health (mutated in place)
 */
export interface SourceHealthState {
  consecutiveFailures: number;
  /** Degraded event already emitted for the current failure run */
  degradedFired: boolean;
  latest: SensorReading | null;
  /** Most recent valid reading, kept for display only */
  lastValid: SensorReading | null;
}

export type SourceHealthChange = 'degraded' | 'recovered' | null;

export interface SourceStatus {
  sourceId: string;
  latest: SensorReading | null;
  lastValid: SensorReading | null;
  consecutiveFailures: number;
  degraded: boolean;
}

/**
 * Result of one completed sampling cycle
 */
export interface SamplerSnapshot {
  /** Start of the cycle; null before the first one */
  takenAt: number | null;
  /** Valid readings of the cycle, the only automation input */
  readings: readonly SensorReading[];
  sources: readonly SourceStatus[];
}

export interface SamplerConfig {
  SAMPLE_PERIOD_SEC: number;
  SENSOR_TIMEOUT_MS: number;
  SENSOR_DEGRADED_AFTER: number;
}

export interface EnvironmentSampler {
  /** True when the sampling sub-cycle is due */
  isDue(now: number): boolean;
  /** Read every source concurrently and publish the snapshot; never rejects */
  sample(now: number): Promise<SamplerSnapshot>;
  getSnapshot(): SamplerSnapshot;
}
