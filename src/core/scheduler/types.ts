/**
 * Automation scheduler type definitions
 */

import type { ActuatorAction, ActuatorCommand, SensorReading } from '@events';

/**
 * What the scheduler needs to know about an actuator
 */
export interface ActuatorView {
  actuatorId: string;
  on: boolean;
  pulseInFlight: boolean;
}

export interface SchedulerInput {
  /** Valid readings of the latest sampling cycle */
  readings: readonly SensorReading[];
  now: number;
  actuators: readonly ActuatorView[];
}

/**
 * Per-rule memory (mutated in place)
 */
export interface RuleState {
  /** Hysteresis latch; time windows mirror their level here */
  engaged: boolean;
  /** Last time the rule's proposal was issued */
  lastProposedAt: number | null;
}

/**
 * A rule's wish for its actuator this tick; null means no opinion
 */
export interface RuleDesire {
  ruleId: string;
  action: ActuatorAction;
  reason: string;
  cooldownMs: number;
}

export interface AutomationScheduler {
  /** Evaluate every rule in declaration order and propose scheduler commands */
  evaluate(input: SchedulerInput): ActuatorCommand[];
  getRuleState(ruleId: string): RuleState | null;
}
