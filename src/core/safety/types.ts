/**
 * Safety monitor type definitions
 */

import type { DigitalInput } from '$types';
import type { ActuatorCommand, SafetyState, SafetyTransition } from '@events';

/**
 * Physical safety inputs
 */
export interface SafetyInputs {
  /** Emergency stop (true = asserted) */
  estop: DigitalInput;
  /** Manual override key switch (true = asserted) */
  override: DigitalInput;
}

/**
 * Levels read this tick, after faults are folded in
 */
export interface SafetyInputLevels {
  /** Stop pressed, or any safety input unreadable */
  stopAsserted: boolean;
  overrideAsserted: boolean;
  /** First fault detail this tick, null when both inputs answered */
  fault: string | null;
  /** An operator reset is pending */
  resetRequested: boolean;
}

/**
 * Decision from nextSafetyState
 */
export interface SafetyDecision {
  /** New state, or null to stay */
  next: SafetyState | null;
  reason: string;
  /** Set when a pending reset was refused */
  resetRefused?: string;
}

export interface SafetySnapshot {
  state: SafetyState;
  /** Cause of the last transition */
  reason: string;
  /** Time of the last transition (ms) */
  since: number;
}

export interface SafetyTickResult {
  state: SafetyState;
  transition: SafetyTransition | null;
  /** Safety `off` commands, issued on the transition to stopped only */
  commands: ActuatorCommand[];
}

export interface SafetyMonitorConfig {
  INPUT_TIMEOUT_MS: number;
}

export interface SafetyMonitor {
  /** Read inputs and apply the state machine; never rejects */
  tick(now: number): Promise<SafetyTickResult>;
  /** Ask for a return from stopped; evaluated on the next tick */
  requestReset(): void;
  getState(): SafetyState;
  getSnapshot(): SafetySnapshot;
}
