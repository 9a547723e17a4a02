/**
 * Tests for bounded sensor reads
 */

import type { SensorSpec } from '$types';
import { createFakeTimer, createScriptedSource, flushPromises, raw } from '$test-utils';
import type { SensorReading } from '@events';
import { readSensor } from './sensors';

const AIR: SensorSpec = { id: 'air-temp', kind: 'temperature', unit: 'C', min: -10, max: 50 };

describe('readSensor', () => {
  it('should return a valid normalised reading', async () => {
    const timer = createFakeTimer();
    const source = createScriptedSource('air-temp', 'temperature', [raw(24.444)]);

    const reading = await readSensor(source, AIR, timer, 1000, 5000);

    expect(reading).toEqual({ sourceId: 'air-temp', kind: 'temperature', value: 24.44, unit: 'C', timestamp: 5000, valid: true });
    expect(timer.pendingCount()).toBe(0);
  });

  it('should mark a thrown read invalid', async () => {
    const source = createScriptedSource('air-temp', 'temperature', [new Error('bus error')]);

    const reading = await readSensor(source, AIR, createFakeTimer(), 1000, 0);

    expect(reading.valid).toBe(false);
    expect(reading.value).toBeNull();
    expect(reading.error).toBe('bus error');
  });

  it('should mark an out-of-range read invalid with the value kept', async () => {
    const source = createScriptedSource('air-temp', 'temperature', [raw(99)]);

    const reading = await readSensor(source, AIR, createFakeTimer(), 1000, 0);

    expect(reading.valid).toBe(false);
    expect(reading.value).toBe(99);
    expect(reading.error).toBe('Sensor air-temp returned an invalid reading: 99C outside -10..50');
  });

  it('should time out a read that never answers', async () => {
    const timer = createFakeTimer();
    const source = createScriptedSource('air-temp', 'temperature', ['hang']);
    let result: SensorReading | null = null;

    readSensor(source, AIR, timer, 1000, 0).then(function(reading) { result = reading; }, function() { /* never rejects */ });
    await flushPromises();
    expect(result).toBeNull();

    timer.advance(1000);
    await flushPromises();

    expect(result).toEqual({
      sourceId: 'air-temp',
      kind: 'temperature',
      value: null,
      unit: 'C',
      timestamp: 0,
      valid: false,
      error: 'Sensor air-temp did not answer within 1000ms'
    });
  });
});
