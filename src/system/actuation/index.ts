export { createActuatorController } from './controller';
export { arbitrate, groupByActuator, sameAction, isValidDuration } from './helpers';
export type {
  ActuatorController,
  ActuatorControllerConfig,
  ActuatorControllerDependencies,
  ActuatorRuntime,
  ActuatorSnapshot
} from './types';
