/**
 * Tests for bounded actuator calls
 */

import { ActuatorRejectedError } from '$types';
import { createFakeTimer, createRecordingActuatorSink, flushPromises } from '$test-utils';
import { setActuator } from './actuators';

describe('setActuator', () => {
  it('should drive the sink', async () => {
    const sink = createRecordingActuatorSink();

    await setActuator(sink, 'fan', true, createFakeTimer(), 500);

    expect(sink.calls).toEqual([{ actuatorId: 'fan', on: true }]);
    expect(sink.state('fan')).toBe(true);
  });

  it('should wrap a driver failure', async () => {
    const sink = createRecordingActuatorSink();
    sink.failing.add('pump');

    await expect(setActuator(sink, 'pump', false, createFakeTimer(), 500)).rejects.toThrow(
      new ActuatorRejectedError('pump', 'off failed: relay fault')
    );
  });

  it('should fail a call that never answers', async () => {
    const timer = createFakeTimer();
    const sink = createRecordingActuatorSink();
    sink.hanging.add('pump');
    let failure: unknown = null;

    setActuator(sink, 'pump', true, timer, 500).catch(function(err: unknown) { failure = err; });
    timer.advance(500);
    await flushPromises();

    expect(failure).toBeInstanceOf(ActuatorRejectedError);
    expect(failure).toHaveProperty('message', 'Actuator pump rejected command: on failed: no answer within 500ms');
  });
});
