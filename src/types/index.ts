/**
 * Shared type barrel
 */

export type { SensorKind, EpochMs, MaybeValue } from './common';
export type { RawSensorValue, SensorSource, ActuatorSink, DigitalInput, TimerAPI } from './hal';
export type {
  SensorSpec,
  ActuatorSpec,
  RuleActionSpec,
  ThresholdRuleSpec,
  TimeWindowRuleSpec,
  RuleSpec,
  HumanActionSpec,
  ButtonSpec,
  GrowUserConfig,
  GrowAppConstants,
  GrowConfig
} from './config';
export {
  ValidationError,
  ConfigInvalidError,
  TimeoutError,
  SensorTimeoutError,
  SensorInvalidError,
  ActuatorRejectedError,
  SafetyFaultError,
  describeError
} from './errors';
