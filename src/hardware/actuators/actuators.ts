/**
 * Actuator output
 * Bounded call into the actuator sink with a single failure type
 */

import { ActuatorRejectedError, TimeoutError, describeError } from '$types';
import type { ActuatorSink, TimerAPI } from '$types';
import { withTimeout } from '@utils/time';

/**
 * Drive an actuator on or off
 *
 * Any failure (rejection, throw, timeout) surfaces as ActuatorRejectedError.
 *
 * @param sink - Actuator sink
 * @param actuatorId - Actuator to drive
 * @param on - Desired state
 * @param timerApi - Timer for the call deadline
 * @param timeoutMs - Call deadline
 */
export async function setActuator(
  sink: ActuatorSink,
  actuatorId: string,
  on: boolean,
  timerApi: TimerAPI,
  timeoutMs: number
): Promise<void> {
  try {
    await withTimeout(sink.set(actuatorId, on), timeoutMs, timerApi, function() {
      return new TimeoutError('no answer within ' + timeoutMs + 'ms');
    });
  } catch (err) {
    throw new ActuatorRejectedError(actuatorId, (on ? 'on' : 'off') + ' failed: ' + describeError(err));
  }
}
