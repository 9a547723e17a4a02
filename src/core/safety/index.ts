export { createSafetyMonitor } from './safety';
export { nextSafetyState } from './helpers';
export type {
  SafetyDecision,
  SafetyInputLevels,
  SafetyInputs,
  SafetyMonitor,
  SafetyMonitorConfig,
  SafetySnapshot,
  SafetyTickResult
} from './types';
