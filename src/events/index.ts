export { ORIGIN_PRIORITY, REJECT_REASONS, SAFETY_STATES } from './types';
export type {
  SensorReading,
  ActuatorAction,
  CommandOrigin,
  ActuatorCommand,
  CommandStatus,
  RejectReason,
  CommandOutcome,
  SafetyState,
  SafetyTransition,
  ActivityEvent,
  SessionEndReason,
  Session,
  SessionChange,
  SensorHealthChange,
  InputMessage,
  InputMessageType,
  ControlEvent,
  ControlEventType,
  EventSink,
  EventPublisher
} from './types';
export { createEventQueue } from './event-queue';
export type { EventQueue, EventQueueConfig } from './event-queue';
export { createJsonlSink, toJsonLine } from './jsonl-sink';
export type { JsonlFiles } from './jsonl-sink';
export { formatAction, formatCommand, formatOutcome } from './helpers';
