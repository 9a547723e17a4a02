export { createControlLoop } from './control';
export { applyInputs, formatStatus, formatUptime } from './helpers';
export type { ControlComponents, ControlLoop, ControlLoopConfig, ControlLoopDependencies, ControlStatus } from './types';
