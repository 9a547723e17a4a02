/**
 * Environment sampler
 *
 * Polls every registered source on the SAMPLE_PERIOD_SEC sub-cycle. All
 * sources are read concurrently, each bounded by SENSOR_TIMEOUT_MS, and the
 * snapshot is only replaced once the whole cycle has finished.
 */

import type { TimerAPI } from '$types';
import type { EventPublisher, SensorReading } from '@events';
import { readSensor } from '@hardware/sensors';
import type { Logger } from '@logging';
import { fmtValue } from '@logging';
import { TIME_CONSTANTS } from '@utils/constants';
import { createSourceHealth, updateSourceHealth } from './helpers';
import type { EnvironmentSampler, RegisteredSensor, SamplerConfig, SamplerSnapshot, SourceHealthState, SourceStatus } from './types';

/**
 * Create the environment sampler
 *
 * @param sensors - Static sensor registry
 * @param timerApi - Timer for read deadlines
 * @param logger - Logger
 * @param publisher - Event publisher for readings and health changes
 * @param config - Sampling period, timeout and degraded threshold
 * @returns Environment sampler
 */
export function createEnvironmentSampler(
  sensors: readonly RegisteredSensor[],
  timerApi: TimerAPI,
  logger: Logger,
  publisher: EventPublisher,
  config: SamplerConfig
): EnvironmentSampler {
  const periodMs = config.SAMPLE_PERIOD_SEC * TIME_CONSTANTS.MS_PER_SECOND;
  const health = new Map<string, SourceHealthState>();
  for (const sensor of sensors) {
    health.set(sensor.spec.id, createSourceHealth());
  }

  let lastSampleAt: number | null = null;
  let snapshot: SamplerSnapshot = { takenAt: null, readings: [], sources: statuses() };

  function statuses(): SourceStatus[] {
    const result: SourceStatus[] = [];
    for (const entry of health) {
      result.push({
        sourceId: entry[0],
        latest: entry[1].latest,
        lastValid: entry[1].lastValid,
        consecutiveFailures: entry[1].consecutiveFailures,
        degraded: entry[1].degradedFired
      });
    }
    return result;
  }

  function isDue(now: number): boolean {
    return lastSampleAt === null || now - lastSampleAt >= periodMs;
  }

  function record(reading: SensorReading, now: number): void {
    publisher.publish({ type: 'reading', timestamp: now, payload: reading });

    const state = health.get(reading.sourceId);
    if (state === undefined) {
      return;
    }

    const change = updateSourceHealth(state, reading, config.SENSOR_DEGRADED_AFTER);
    if (change === null) {
      if (!reading.valid) {
        logger.debug('Invalid reading from ' + reading.sourceId + ': ' + (reading.error ?? 'unknown'));
      }
      return;
    }

    publisher.publish({
      type: 'sensor',
      timestamp: now,
      payload: { status: change, sourceId: reading.sourceId, consecutiveFailures: state.consecutiveFailures }
    });

    if (change === 'degraded') {
      logger.warning('Sensor ' + reading.sourceId + ' degraded after ' + state.consecutiveFailures + ' invalid reads: ' + (reading.error ?? 'unknown'));
    } else {
      logger.info('Sensor ' + reading.sourceId + ' recovered: ' + fmtValue(reading.value, reading.unit));
    }
  }

  async function sample(now: number): Promise<SamplerSnapshot> {
    lastSampleAt = now;

    const readings = await Promise.all(sensors.map(function(sensor) {
      return readSensor(sensor.source, sensor.spec, timerApi, config.SENSOR_TIMEOUT_MS, now);
    }));

    for (const reading of readings) {
      record(reading, now);
    }

    snapshot = {
      takenAt: now,
      readings: readings.filter(function(reading) { return reading.valid; }),
      sources: statuses()
    };
    return snapshot;
  }

  return {
    isDue: isDue,
    sample: sample,
    getSnapshot: function() { return snapshot; }
  };
}
