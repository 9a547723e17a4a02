/**
 * Manually driven TimerAPI with a virtual clock
 */

import type { TimerAPI } from '$types';

interface PendingTimer {
  id: number;
  due: number;
  intervalMs: number;
  repeat: boolean;
  callback: () => void;
}

export interface FakeTimer extends TimerAPI {
  /** Current virtual time (ms) */
  now(): number;
  /** Move the clock forward, firing due timers in order */
  advance(ms: number): void;
  /** Number of timers still scheduled */
  pendingCount(): number;
}

/**
 * Create a fake timer
 * @param startMs - Initial virtual time
 * @returns Fake timer
 */
export function createFakeTimer(startMs = 0): FakeTimer {
  let current = startMs;
  let nextId = 1;
  const timers = new Map<number, PendingTimer>();

  function set(intervalMs: number, repeat: boolean, callback: () => void): number {
    const id = nextId++;
    timers.set(id, { id: id, due: current + intervalMs, intervalMs: intervalMs, repeat: repeat, callback: callback });
    return id;
  }

  function clear(timerId: number): void {
    timers.delete(timerId);
  }

  function nextDue(limit: number): PendingTimer | null {
    let found: PendingTimer | null = null;
    for (const timer of timers.values()) {
      if (timer.due > limit) continue;
      if (found === null || timer.due < found.due || (timer.due === found.due && timer.id < found.id)) {
        found = timer;
      }
    }
    return found;
  }

  function advance(ms: number): void {
    const target = current + ms;
    let timer = nextDue(target);
    while (timer !== null) {
      current = timer.due;
      if (timer.repeat) {
        timer.due += Math.max(timer.intervalMs, 1);
      } else {
        timers.delete(timer.id);
      }
      timer.callback();
      timer = nextDue(target);
    }
    current = target;
  }

  return {
    set: set,
    clear: clear,
    now: function() { return current; },
    advance: advance,
    pendingCount: function() { return timers.size; }
  };
}
