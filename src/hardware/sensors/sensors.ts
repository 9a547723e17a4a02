/**
 * Sensor reading
 * Bounded read of one registered source, always resolving to a reading
 */

import { SensorInvalidError, SensorTimeoutError, describeError } from '$types';
import type { SensorSource, SensorSpec, TimerAPI } from '$types';
import type { SensorReading } from '@events';
import { withTimeout } from '@utils/time';
import { normalizeReading } from './helpers';

/**
 * Read and normalise one sensor
 *
 * Timeouts, thrown reads and unusable values all produce a reading with
 * valid=false and the cause in `error`; this function never rejects.
 *
 * @param source - Sensor to read
 * @param spec - Registry entry for the sensor
 * @param timerApi - Timer for the read deadline
 * @param timeoutMs - Read deadline
 * @param timestamp - Timestamp recorded on the reading
 * @returns Sensor reading
 */
export async function readSensor(
  source: SensorSource,
  spec: SensorSpec,
  timerApi: TimerAPI,
  timeoutMs: number,
  timestamp: number
): Promise<SensorReading> {
  let value: number | null = null;
  let unit = spec.unit;

  try {
    const raw = await withTimeout(source.read(), timeoutMs, timerApi, function() {
      return new SensorTimeoutError(source.id, timeoutMs);
    });
    const normalized = normalizeReading(raw, spec);
    value = normalized.value;
    unit = normalized.unit;
    if (!normalized.valid) {
      throw new SensorInvalidError(source.id, normalized.error);
    }

    return {
      sourceId: source.id,
      kind: source.kind,
      value: normalized.value,
      unit: normalized.unit,
      timestamp: timestamp,
      valid: true
    };
  } catch (err) {
    return {
      sourceId: source.id,
      kind: source.kind,
      value: value,
      unit: unit,
      timestamp: timestamp,
      valid: false,
      error: describeError(err)
    };
  }
}
