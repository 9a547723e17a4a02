/**
 * Tests for configuration validator
 */

import CONFIG from '@boot/config';
import type { GrowConfig } from '$types';
import { validateConfig } from './validator';

const validConfig: GrowConfig = {
  ...CONFIG,
  SENSORS: [
    { id: 'air-temp', kind: 'temperature', unit: 'C', min: -10, max: 50 },
    { id: 'bed-moisture', kind: 'moisture', unit: '%', min: 0, max: 100 }
  ],
  ACTUATORS: [
    { id: 'fan', minIntervalSec: 30, maxRuntimeSec: 3000, runtimeWindowSec: 3600, maxPulseSec: 600, maxOnSec: 1800 },
    { id: 'pump', minIntervalSec: 300, maxRuntimeSec: 180, runtimeWindowSec: 3600, maxPulseSec: 30, maxOnSec: 60 }
  ],
  RULES: [
    { id: 'fan-heat', type: 'threshold', actuatorId: 'fan', sensorId: 'air-temp', direction: 'above', onAt: 28, offAt: 22, action: { type: 'on' }, cooldownSec: 0 },
    { id: 'irrigate', type: 'threshold', actuatorId: 'pump', sensorId: 'bed-moisture', direction: 'below', onAt: 30, offAt: 45, action: { type: 'pulse', durationSec: 20 }, cooldownSec: 600 }
  ],
  BUTTONS: [
    { id: 'water', activity: 'watering', command: { actuatorId: 'pump', action: { type: 'pulse', durationSec: 10 } } }
  ]
};

function fields(list: { field: string }[]): string[] {
  return list.map(function(entry) { return entry.field; });
}

describe('validateConfig', () => {
  it('should accept a consistent configuration', () => {
    const result = validateConfig(validConfig);

    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.valid).toBe(true);
  });

  describe('timing', () => {
    it('should refuse a tick period above one second', () => {
      const result = validateConfig({ ...validConfig, TICK_PERIOD_MS: 1500 });

      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('TICK_PERIOD_MS must be between 50 and 1000 (got 1500)');
    });

    it('should refuse a sampling period outside 5-300 s', () => {
      expect(fields(validateConfig({ ...validConfig, SAMPLE_PERIOD_SEC: 4 }).errors)).toContain('SAMPLE_PERIOD_SEC');
      expect(fields(validateConfig({ ...validConfig, SAMPLE_PERIOD_SEC: 301 }).errors)).toContain('SAMPLE_PERIOD_SEC');
    });

    it('should refuse a sensor timeout as long as the sampling period', () => {
      const result = validateConfig({ ...validConfig, SAMPLE_PERIOD_SEC: 5, SENSOR_TIMEOUT_MS: 5000 });

      expect(result.errors).toEqual([{ field: 'SENSOR_TIMEOUT_MS', message: 'SENSOR_TIMEOUT_MS must be shorter than the sampling period' }]);
    });
  });

  describe('registry', () => {
    it('should report duplicate sensor ids', () => {
      const result = validateConfig({ ...validConfig, SENSORS: [validConfig.SENSORS[0], validConfig.SENSORS[0]] });

      expect(result.errors).toContainEqual({ field: 'SENSORS[1].id', message: 'Duplicate id "air-temp"' });
    });

    it('should report an inverted plausible range', () => {
      const result = validateConfig({
        ...validConfig,
        SENSORS: [{ id: 'air-temp', kind: 'temperature', unit: 'C', min: 50, max: -10 }, validConfig.SENSORS[1]]
      });

      expect(fields(result.errors)).toEqual(['SENSORS[0].min']);
    });

    it('should refuse a runtime budget larger than its window', () => {
      const result = validateConfig({
        ...validConfig,
        ACTUATORS: [{ ...validConfig.ACTUATORS[0], maxRuntimeSec: 7200 }, validConfig.ACTUATORS[1]]
      });

      expect(fields(result.errors)).toEqual(['ACTUATORS[0].maxRuntimeSec']);
    });

    it('should name the actuator whose limit is out of range', () => {
      const result = validateConfig({
        ...validConfig,
        ACTUATORS: [validConfig.ACTUATORS[0], { ...validConfig.ACTUATORS[1], minIntervalSec: -5 }]
      });

      expect(result.errors).toEqual([
        { field: 'ACTUATORS[1].minIntervalSec', message: 'pump: minIntervalSec must be between 0 and 86400 (got -5)' }
      ]);
    });
  });

  describe('rules', () => {
    it('should refuse offAt on the wrong side of onAt', () => {
      const result = validateConfig({
        ...validConfig,
        RULES: [{ id: 'fan-heat', type: 'threshold', actuatorId: 'fan', sensorId: 'air-temp', direction: 'above', onAt: 22, offAt: 28, action: { type: 'on' }, cooldownSec: 0 }]
      });

      expect(result.errors).toEqual([{ field: 'RULES[0].offAt', message: "offAt must be below onAt for direction 'above'" }]);
    });

    it('should refuse references to unknown devices', () => {
      const result = validateConfig({
        ...validConfig,
        RULES: [{ id: 'mist', type: 'threshold', actuatorId: 'mister', sensorId: 'leaf-wetness', direction: 'below', onAt: 40, offAt: 60, action: { type: 'on' }, cooldownSec: 0 }]
      });

      expect(fields(result.errors)).toEqual(['RULES[0].actuatorId', 'RULES[0].sensorId']);
    });

    it('should refuse malformed and empty time windows', () => {
      const result = validateConfig({
        ...validConfig,
        RULES: [
          { id: 'a', type: 'time_window', actuatorId: 'fan', from: '6:00', to: '22:00', cooldownSec: 0 },
          { id: 'b', type: 'time_window', actuatorId: 'pump', from: '08:00', to: '08:00', cooldownSec: 0 }
        ]
      });

      expect(result.errors).toEqual([
        { field: 'RULES[0].from', message: 'Expected HH:MM (got "6:00")' },
        { field: 'RULES[1].to', message: 'Window must not be empty (from equals to)' }
      ]);
    });

    it('should warn when two rules drive the same actuator', () => {
      const result = validateConfig({
        ...validConfig,
        RULES: [
          validConfig.RULES[0],
          { id: 'night-vent', type: 'time_window', actuatorId: 'fan', from: '22:00', to: '06:00', cooldownSec: 0 }
        ]
      });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        { field: 'RULES[1]', message: 'Rule night-vent shares actuator fan with fan-heat; the later rule wins each tick' }
      ]);
    });

    it('should name the rule whose cooldown is negative', () => {
      const result = validateConfig({ ...validConfig, RULES: [{ ...validConfig.RULES[0], cooldownSec: -1 }] });

      expect(result.errors).toEqual([
        { field: 'RULES[0].cooldownSec', message: 'fan-heat: cooldownSec must be between 0 and 86400 (got -1)' }
      ]);
    });

    it('should warn when a pulse will be clamped', () => {
      const result = validateConfig({
        ...validConfig,
        RULES: [{ id: 'irrigate', type: 'threshold', actuatorId: 'pump', sensorId: 'bed-moisture', direction: 'below', onAt: 30, offAt: 45, action: { type: 'pulse', durationSec: 90 }, cooldownSec: 600 }]
      });

      expect(result.warnings).toEqual([
        { field: 'RULES[0].action.durationSec', message: 'Pulse longer than maxPulseSec of pump; it will be clamped' }
      ]);
    });
  });

  describe('buttons', () => {
    it('should refuse a button commanding an unknown actuator', () => {
      const result = validateConfig({
        ...validConfig,
        BUTTONS: [{ id: 'mist', activity: 'misting', command: { actuatorId: 'mister', action: { type: 'on' } } }]
      });

      expect(result.errors).toEqual([{ field: 'BUTTONS[0].command.actuatorId', message: 'Unknown actuator "mister"' }]);
    });
  });

  it('should warn about Slack enabled without a webhook', () => {
    const result = validateConfig({ ...validConfig, SLACK_ENABLED: true, SLACK_WEBHOOK_URL: '' });

    expect(fields(result.warnings)).toEqual(['SLACK_WEBHOOK_URL']);
  });
});
