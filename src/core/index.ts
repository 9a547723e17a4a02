/**
 * Core control components
 *
 * - safety: emergency stop / override state machine
 * - sampler: sensor polling, normalisation and source health
 * - scheduler: threshold and time-of-day automation rules
 * - rate-limit: activation limits used by the actuator controller
 */

export * from './safety';
export * from './sampler';
export * from './scheduler';
export * from './rate-limit';
