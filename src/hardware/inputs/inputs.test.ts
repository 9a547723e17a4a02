/**
 * Tests for bounded input reads
 */

import { TimeoutError } from '$types';
import { createFakeInput, createFakeTimer, flushPromises } from '$test-utils';
import { readInput } from './inputs';

describe('readInput', () => {
  it('should return the input level', async () => {
    await expect(readInput(createFakeInput(true), 'estop', createFakeTimer(), 100)).resolves.toBe(true);
  });

  it('should pass driver errors through', async () => {
    const input = createFakeInput();
    input.failing = true;

    await expect(readInput(input, 'estop', createFakeTimer(), 100)).rejects.toThrow('input bus error');
  });

  it('should time out', async () => {
    const timer = createFakeTimer();
    const input = createFakeInput();
    input.hanging = true;
    let failure: unknown = null;

    readInput(input, 'estop', timer, 100).catch(function(err: unknown) { failure = err; });
    timer.advance(100);
    await flushPromises();

    expect(failure).toBeInstanceOf(TimeoutError);
    expect(failure).toHaveProperty('message', 'Input estop did not answer within 100ms');
  });
});
