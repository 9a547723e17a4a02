/**
 * Control module type definitions
 */

import type { AutomationScheduler, EnvironmentSampler, SafetyMonitor, SafetySnapshot, SourceStatus } from '@core';
import type { Session } from '@events';
import type { SessionManager } from '@features/session';
import type { Logger } from '@logging';
import type { ActuatorController, ActuatorSnapshot } from '@system/actuation';
import type { InputQueue } from '@system/inputs';
import type { LoopState } from '@system/state/state';
import type { TimerAPI } from '$types';

/**
 * Components one loop drives, each created by its own factory
 */
export interface ControlComponents {
  safety: SafetyMonitor;
  sampler: EnvironmentSampler;
  scheduler: AutomationScheduler;
  actuators: ActuatorController;
  session: SessionManager;
  inputs: InputQueue;
}

export interface ControlLoopDependencies {
  timerApi: TimerAPI;
  logger: Logger;
  /** Current time (ms) */
  clock: () => number;
}

export interface ControlLoopConfig {
  TICK_PERIOD_MS: number;
  MAX_CONSECUTIVE_ERRORS: number;
}

/**
 * Operator status report
 */
export interface ControlStatus {
  now: number;
  loop: LoopState;
  safety: SafetySnapshot;
  actuators: ActuatorSnapshot[];
  session: Session | null;
  present: boolean;
  sensors: readonly SourceStatus[];
}

export interface ControlLoop {
  /** Run one tick; a tick requested while one is running is skipped */
  tick(now: number): Promise<void>;
  /** Start ticking every TICK_PERIOD_MS (idempotent) */
  start(): void;
  /** Stop ticking and wait for a running tick to finish */
  stop(): Promise<void>;
  getStatus(): ControlStatus;
}
