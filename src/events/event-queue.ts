/**
 * Bounded event queue in front of the event sink
 *
 * publish() only enqueues. A drain timer hands events to the sink one at a
 * time, awaiting each append. When the queue is full the oldest event is
 * dropped, so a slow or broken sink can never stall the control loop.
 */

import { describeError } from '$types';
import type { TimerAPI } from '$types';
import type { Logger } from '@logging';
import type { ControlEvent, EventPublisher, EventSink } from './types';

export interface EventQueueConfig {
  /** Maximum queued events before the oldest is dropped */
  capacity: number;
  /** Interval between drains (ms) */
  drainIntervalMs: number;
}

export interface EventQueue extends EventPublisher {
  /** Start the drain timer (idempotent) */
  start(): void;
  /** Stop the drain timer; queued events stay queued */
  stop(): void;
  /** Drain everything queued now, including events published while draining */
  flush(): Promise<void>;
  size(): number;
  /** Events dropped on overflow since creation */
  droppedCount(): number;
}

/**
 * Create the event queue
 *
 * @param sink - Durable event sink
 * @param timerApi - Timer for the drain cadence
 * @param logger - Logger for overflow and sink failures
 * @param config - Capacity and drain interval
 * @returns Event queue
 */
export function createEventQueue(
  sink: EventSink,
  timerApi: TimerAPI,
  logger: Logger,
  config: EventQueueConfig
): EventQueue {
  const queue: ControlEvent[] = [];
  let dropped = 0;
  let overflowReported = false;
  let drainTimerId: number | null = null;
  let draining: Promise<void> | null = null;

  function publish(event: ControlEvent): void {
    if (queue.length >= config.capacity) {
      queue.shift();
      dropped++;
      if (!overflowReported) {
        overflowReported = true;
        logger.warning('Event queue full (' + config.capacity + '), dropping oldest events');
      }
    }
    queue.push(event);
  }

  async function drainQueue(): Promise<void> {
    // Taken off the queue before the append, so an overflow never drops it
    let event = queue.shift();
    while (event !== undefined) {
      try {
        await sink.append(event);
      } catch (err) {
        logger.warning('Event sink append failed (' + event.type + '): ' + describeError(err));
      }
      event = queue.shift();
    }
    overflowReported = false;
  }

  /**
   * Run a drain unless one is in flight
   * @returns Promise for the running drain
   */
  function drain(): Promise<void> {
    if (draining === null) {
      draining = drainQueue().finally(function() {
        draining = null;
      });
    }
    return draining;
  }

  function onDrainTimer(): void {
    drain().catch(function(err: unknown) {
      logger.critical('Event queue drain crashed: ' + describeError(err));
    });
  }

  function start(): void {
    if (drainTimerId === null) {
      drainTimerId = timerApi.set(config.drainIntervalMs, true, onDrainTimer);
    }
  }

  function stop(): void {
    if (drainTimerId !== null) {
      timerApi.clear(drainTimerId);
      drainTimerId = null;
    }
  }

  async function flush(): Promise<void> {
    await drain();
    if (queue.length > 0) {
      await drain();
    }
  }

  return {
    publish: publish,
    start: start,
    stop: stop,
    flush: flush,
    size: function() { return queue.length; },
    droppedCount: function() { return dropped; }
  };
}
