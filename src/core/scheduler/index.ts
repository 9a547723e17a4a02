export { createAutomationScheduler } from './scheduler';
export { decideEngaged, differsFromActuator, cooldownElapsed } from './helpers';
export type { ActuatorView, AutomationScheduler, RuleDesire, RuleState, SchedulerInput } from './types';
