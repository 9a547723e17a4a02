/**
 * Time utility functions
 */

import type { TimerAPI } from '$types';

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Create a TimerAPI backed by Node's timers
 *
 * Timer ids are plain numbers so callers never hold Node handles.
 * Handles are unref'd: a pending pulse or retry never keeps the
 * process alive on its own.
 *
 * @returns TimerAPI instance
 */
export function createNodeTimer(): TimerAPI {
  const handles = new Map<number, NodeJS.Timeout>();
  let nextId = 1;

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    const id = nextId++;
    let handle: NodeJS.Timeout;
    if (repeat) {
      handle = setInterval(callback, intervalMs);
    } else {
      handle = setTimeout(function() {
        handles.delete(id);
        callback();
      }, intervalMs);
    }
    handle.unref();
    handles.set(id, handle);
    return id;
  }

  function clear(timerId: number): void {
    const handle = handles.get(timerId);
    if (handle === undefined) return;
    clearTimeout(handle);
    handles.delete(timerId);
  }

  return {
    set: set,
    clear: clear
  };
}

/**
 * Bound a promise by a timeout
 *
 * Settles with whichever comes first: the task or the timer.
 * A task that settles after the timeout is ignored.
 *
 * @param task - Promise to bound
 * @param timeoutMs - Time budget in milliseconds
 * @param timerApi - Timer used for the deadline
 * @param onTimeout - Builds the rejection reason when the deadline passes
 * @returns Promise settling with the task result or the timeout error
 */
export function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  timerApi: TimerAPI,
  onTimeout: () => Error
): Promise<T> {
  return new Promise<T>(function(resolve, reject) {
    let settled = false;

    const timerId = timerApi.set(timeoutMs, false, function() {
      if (settled) return;
      settled = true;
      reject(onTimeout());
    });

    task.then(
      function(value) {
        if (settled) return;
        settled = true;
        timerApi.clear(timerId);
        resolve(value);
      },
      function(err: unknown) {
        if (settled) return;
        settled = true;
        timerApi.clear(timerId);
        reject(err);
      }
    );
  });
}
