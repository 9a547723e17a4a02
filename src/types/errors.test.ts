/**
 * Tests for control core error types
 */

import {
  ValidationError,
  ConfigInvalidError,
  TimeoutError,
  SensorTimeoutError,
  SensorInvalidError,
  ActuatorRejectedError,
  SafetyFaultError,
  describeError
} from './errors';

describe('error types', () => {
  describe('ConfigInvalidError', () => {
    it('should extend ValidationError', () => {
      const err = new ConfigInvalidError([{ field: 'TICK_PERIOD_MS', message: 'Too long' }]);

      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('ConfigInvalidError');
    });

    it('should list every issue in the message', () => {
      const err = new ConfigInvalidError([
        { field: 'RULES[0].offAt', message: 'Must be below onAt' },
        { field: 'SENSORS[1].id', message: 'Duplicate id' }
      ]);

      expect(err.message).toBe(
        'Invalid configuration (2 errors): RULES[0].offAt: Must be below onAt; SENSORS[1].id: Duplicate id'
      );
      expect(err.issues).toHaveLength(2);
    });

    it('should use singular wording for one issue', () => {
      const err = new ConfigInvalidError([{ field: 'A', message: 'bad' }]);

      expect(err.message).toBe('Invalid configuration (1 error): A: bad');
    });
  });

  describe('I/O errors', () => {
    it('should name the sensor that timed out', () => {
      const err = new SensorTimeoutError('air-temp', 2000);

      expect(err.message).toBe('Sensor air-temp did not answer within 2000ms');
      expect(err.sourceId).toBe('air-temp');
      expect(err.name).toBe('SensorTimeoutError');
    });

    it('should describe invalid readings', () => {
      const err = new SensorInvalidError('soil-1', 'value 140 outside [0, 100]');

      expect(err.message).toBe('Sensor soil-1 returned an invalid reading: value 140 outside [0, 100]');
    });

    it('should name the rejecting actuator', () => {
      const err = new ActuatorRejectedError('pump', 'relay board offline');

      expect(err.actuatorId).toBe('pump');
      expect(err.message).toBe('Actuator pump rejected command: relay board offline');
    });

    it('should name the faulted safety input', () => {
      const err = new SafetyFaultError('emergency-stop', 'bus error');

      expect(err.input).toBe('emergency-stop');
      expect(err.name).toBe('SafetyFaultError');
    });

    it('should keep TimeoutError distinct from Error subclasses above', () => {
      const err = new TimeoutError('read timed out');

      expect(err).toBeInstanceOf(Error);
      expect(err).not.toBeInstanceOf(ValidationError);
    });
  });

  describe('describeError', () => {
    it('should return the message of an Error', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('should stringify anything else', () => {
      expect(describeError('plain')).toBe('plain');
      expect(describeError(42)).toBe('42');
    });
  });
});
