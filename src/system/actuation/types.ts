/**
 * Actuator controller type definitions
 */

import type { ActuatorSink, ActuatorSpec, TimerAPI } from '$types';
import type { RateLimitConfig, RateLimitRecord } from '@core/rate-limit';
import type { ActuatorCommand, CommandOutcome, EventPublisher, SafetyState } from '@events';
import type { Logger } from '@logging';

/**
 * Controller-owned state of one actuator (mutated in place)
 */
export interface ActuatorRuntime {
  spec: ActuatorSpec;
  limits: RateLimitConfig;
  record: RateLimitRecord;
  pulseTimerId: number | null;
  pulseEndsAt: number | null;
  /** Off command that failed and is retried by enforceLimits */
  pendingOff: ActuatorCommand | null;
  lastOutcome: CommandOutcome | null;
  /** Tail of this actuator's operation chain */
  chain: Promise<void>;
}

export interface ActuatorSnapshot {
  actuatorId: string;
  on: boolean;
  pulseInFlight: boolean;
  pulseEndsAt: number | null;
  runtimeInWindowMs: number;
  pendingOff: boolean;
  lastOutcome: CommandOutcome | null;
}

export interface ActuatorControllerConfig {
  ACTUATOR_TIMEOUT_MS: number;
}

export interface ActuatorControllerDependencies {
  sink: ActuatorSink;
  timerApi: TimerAPI;
  logger: Logger;
  publisher: EventPublisher;
  /** Current time (ms), read when a pulse timer fires */
  clock: () => number;
}

export interface ActuatorController {
  /** Arbitrate and apply a batch; resolves with one outcome per command, never rejects */
  execute(commands: readonly ActuatorCommand[], safetyState: SafetyState, now: number): Promise<CommandOutcome[]>;
  /** Cut runs past their limits and retry failed offs */
  enforceLimits(now: number): Promise<CommandOutcome[]>;
  getSnapshot(now: number): ActuatorSnapshot[];
  /** Cancel every pulse and drive every actuator off */
  shutdown(now: number): Promise<CommandOutcome[]>;
}
