/**
 * Boot type definitions
 */

import type { ChalkInstance } from 'chalk';

import type { ActuatorSink, DigitalInput, GrowConfig, SensorSource, TimerAPI } from '$types';
import type { EventQueue, EventSink } from '@events';
import type { ConsoleAPI, HttpPost, Logger } from '@logging';
import type { ControlComponents, ControlLoop } from '@system/control';

/**
 * Drivers supplied at startup
 */
export interface Devices {
  /** One driver per registered sensor, matched by id */
  sensors: readonly SensorSource[];
  sink: ActuatorSink;
  estop: DigitalInput;
  override: DigitalInput;
  presence: DigitalInput;
}

/**
 * Process-level services the controller runs on
 */
export interface RuntimeDependencies {
  timerApi: TimerAPI;
  /** Current time (ms) */
  clock: () => number;
  consoleApi: ConsoleAPI;
  httpPost: HttpPost;
  /** Event sink; defaults to the JSON-lines file, or the DEBUG log when EVENT_LOG_PATH is empty */
  eventSink?: EventSink;
  /** Session id factory */
  createId?: () => string;
  /** Console colours; defaults to chalk's auto-detected level */
  painter?: ChalkInstance;
}

/**
 * Wired controller
 */
export interface Controller {
  config: GrowConfig;
  logger: Logger;
  events: EventQueue;
  components: ControlComponents;
  loop: ControlLoop;
  /** Initialise log sinks, print the banner and start the event drain and the loop */
  start(): void;
  /** Stop the loop, close the session, switch every actuator off and flush events and logs */
  shutdown(): Promise<void>;
}
