/**
 * Digital input reading
 */

import { TimeoutError } from '$types';
import type { DigitalInput, TimerAPI } from '$types';
import { withTimeout } from '@utils/time';

/**
 * Read a digital input within a deadline
 * @param input - Input to read
 * @param name - Input name for the timeout message
 * @param timerApi - Timer for the deadline
 * @param timeoutMs - Read deadline
 * @returns Input level
 * @throws TimeoutError when the input does not answer in time, or the driver's own error
 */
export function readInput(
  input: DigitalInput,
  name: string,
  timerApi: TimerAPI,
  timeoutMs: number
): Promise<boolean> {
  return withTimeout(input.read(), timeoutMs, timerApi, function() {
    return new TimeoutError('Input ' + name + ' did not answer within ' + timeoutMs + 'ms');
  });
}
