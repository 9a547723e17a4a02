/**
 * Tests for the bounded event queue
 */

import { createFakeLogger, createFakeTimer, createMemoryEventSink, flushPromises } from '$test-utils';
import type { FakeLogger, FakeTimer, MemoryEventSink } from '$test-utils';
import { createEventQueue } from './event-queue';
import type { ControlEvent } from './types';

function safetyEvent(timestamp: number): ControlEvent {
  return { type: 'safety', timestamp: timestamp, payload: { from: 'normal', to: 'stopped', reason: 'emergency stop asserted' } };
}

describe('createEventQueue', () => {
  let timer: FakeTimer;
  let logger: FakeLogger;
  let sink: MemoryEventSink;

  beforeEach(() => {
    timer = createFakeTimer();
    logger = createFakeLogger();
    sink = createMemoryEventSink();
  });

  it('should hand queued events to the sink in order on the drain timer', async () => {
    const queue = createEventQueue(sink, timer, logger, { capacity: 10, drainIntervalMs: 1000 });

    queue.publish(safetyEvent(1));
    queue.publish(safetyEvent(2));
    queue.start();
    expect(sink.events).toEqual([]);
    expect(queue.size()).toBe(2);

    timer.advance(1000);
    await flushPromises();

    expect(sink.events.map(function(e) { return e.timestamp; })).toEqual([1, 2]);
    expect(queue.size()).toBe(0);
  });

  it('should drop the oldest event when full and warn once per overflow', async () => {
    const queue = createEventQueue(sink, timer, logger, { capacity: 2, drainIntervalMs: 1000 });

    queue.publish(safetyEvent(1));
    queue.publish(safetyEvent(2));
    queue.publish(safetyEvent(3));
    queue.publish(safetyEvent(4));

    expect(queue.size()).toBe(2);
    expect(queue.droppedCount()).toBe(2);
    expect(logger.at(2)).toEqual(['Event queue full (2), dropping oldest events']);

    await queue.flush();

    expect(sink.events.map(function(e) { return e.timestamp; })).toEqual([3, 4]);
  });

  it('should not drop the event being appended when the queue overflows', async () => {
    let release: () => void = function() { return undefined; };
    const written: number[] = [];
    const slow = {
      append: function(event: ControlEvent): Promise<void> {
        written.push(event.timestamp);
        if (event.timestamp !== 1) {
          return Promise.resolve();
        }
        return new Promise<void>(function(resolve) { release = resolve; });
      }
    };
    const queue = createEventQueue(slow, timer, logger, { capacity: 2, drainIntervalMs: 1000 });

    queue.publish(safetyEvent(1));
    const flushed = queue.flush();
    queue.publish(safetyEvent(2));
    queue.publish(safetyEvent(3));
    queue.publish(safetyEvent(4));

    expect(queue.droppedCount()).toBe(1);
    release();
    await flushed;

    expect(written).toEqual([1, 3, 4]);
    expect(queue.size()).toBe(0);
  });

  it('should log a failing append and move on', async () => {
    const failing = { append: vi.fn(() => Promise.reject(new Error('disk full'))) };
    const queue = createEventQueue(failing, timer, logger, { capacity: 10, drainIntervalMs: 1000 });

    queue.publish(safetyEvent(1));
    await queue.flush();

    expect(failing.append).toHaveBeenCalledTimes(1);
    expect(queue.size()).toBe(0);
    expect(logger.at(2)).toEqual(['Event sink append failed (safety): disk full']);
  });

  it('should stop draining once stopped', () => {
    const queue = createEventQueue(sink, timer, logger, { capacity: 10, drainIntervalMs: 1000 });

    queue.start();
    queue.start();
    expect(timer.pendingCount()).toBe(1);

    queue.stop();
    queue.publish(safetyEvent(1));
    timer.advance(5000);

    expect(timer.pendingCount()).toBe(0);
    expect(queue.size()).toBe(1);
  });
});
