/**
 * Debounced, bounded input queue
 *
 * Buttons, operator resets, session requests and manual commands arrive at
 * any time; the control loop drains them at the next tick boundary. A repeat
 * of the same input inside INPUT_DEBOUNCE_MS is dropped. When the queue is
 * full the oldest input is dropped.
 */

import type { InputMessage } from '@events';
import type { Logger } from '@logging';

export interface InputQueueConfig {
  INPUT_DEBOUNCE_MS: number;
  INPUT_QUEUE_SIZE: number;
}

export interface InputQueue {
  /** Queue an input; false when it was debounced away */
  push(message: InputMessage): boolean;
  /** Take every queued input in arrival order */
  drain(): InputMessage[];
  size(): number;
}

/**
 * Key under which repeats of an input are debounced
 * @param message - Input message
 * @returns Debounce key
 */
export function debounceKey(message: InputMessage): string {
  switch (message.type) {
    case 'button':
      return 'button:' + message.buttonId;
    case 'manual_command':
      return 'manual_command:' + message.actuatorId + ':' + message.action.type;
    default:
      return message.type;
  }
}

/**
 * Create the input queue
 * @param config - Debounce window and capacity
 * @param logger - Logger for dropped inputs
 * @returns Input queue
 */
export function createInputQueue(config: InputQueueConfig, logger: Logger): InputQueue {
  let queue: InputMessage[] = [];
  const lastAccepted = new Map<string, number>();

  function push(message: InputMessage): boolean {
    const key = debounceKey(message);
    const last = lastAccepted.get(key);
    if (last !== undefined && message.at - last < config.INPUT_DEBOUNCE_MS) {
      logger.debug('Input ' + key + ' debounced');
      return false;
    }
    lastAccepted.set(key, message.at);

    if (queue.length >= config.INPUT_QUEUE_SIZE) {
      const dropped = queue.shift();
      logger.warning('Input queue full (' + config.INPUT_QUEUE_SIZE + '), dropping oldest input: ' + (dropped === undefined ? 'none' : debounceKey(dropped)));
    }
    queue.push(message);
    return true;
  }

  function drain(): InputMessage[] {
    const taken = queue;
    queue = [];
    return taken;
  }

  return {
    push: push,
    drain: drain,
    size: function() { return queue.length; }
  };
}
