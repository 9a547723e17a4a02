/**
 * Tests for the greenhouse model
 */

import { DEFAULT_EFFECTS, activeEffects, ambientTargets, isDaytime, sensorNoise, stepConditions } from './helpers';
import type { Conditions } from './types';

const ROOM: Conditions = { temperature: 22, humidity: 65, moisture: 45, light: 0 };

describe('isDaytime', () => {
  it('should cover 06:00 up to 18:00', () => {
    expect(isDaytime(359)).toBe(false);
    expect(isDaytime(360)).toBe(true);
    expect(isDaytime(1079)).toBe(true);
    expect(isDaytime(1080)).toBe(false);
  });
});

describe('ambientTargets', () => {
  it('should follow the day and lower humidity as the room warms', () => {
    expect(ambientTargets(ROOM, true)).toEqual({ temperature: 26, humidity: 74, moisture: 20, light: 800 });
    expect(ambientTargets({ ...ROOM, temperature: 20 }, false)).toEqual({ temperature: 20, humidity: 80, moisture: 20, light: 0 });
  });
});

describe('activeEffects', () => {
  it('should collect effects of running actuators and skip unknown ones', () => {
    expect(activeEffects(['pump', 'valve'], DEFAULT_EFFECTS)).toEqual([{ kind: 'moisture', perSecond: 0.5 }]);
    expect(activeEffects([], DEFAULT_EFFECTS)).toEqual([]);
  });
});

describe('stepConditions', () => {
  it('should relax towards the targets', () => {
    const next = stepConditions(ROOM, { temperature: 26, humidity: 65, moisture: 45, light: 0 }, [], 1);

    expect(next.temperature).toBeCloseTo(22.008, 6);
    expect(next.humidity).toBe(65);
  });

  it('should add the effects of running actuators', () => {
    const next = stepConditions(ROOM, ROOM, activeEffects(['fan'], DEFAULT_EFFECTS), 1);

    expect(next.temperature).toBeCloseTo(21.98, 6);
    expect(next.humidity).toBeCloseTo(64.95, 6);
  });

  it('should keep values inside physical bounds', () => {
    const next = stepConditions({ ...ROOM, moisture: 99.9 }, ROOM, [{ kind: 'moisture', perSecond: 0.5 }], 1);

    expect(next.moisture).toBe(100);
  });

  it('should leave its input untouched', () => {
    const before = { ...ROOM };

    stepConditions(ROOM, { ...ROOM, temperature: 30 }, [], 1);

    expect(ROOM).toEqual(before);
  });
});

describe('sensorNoise', () => {
  it('should be centred on zero', () => {
    expect(sensorNoise('temperature', 0.5)).toBe(0);
    expect(sensorNoise('humidity', 0)).toBe(-0.5);
  });
});
