export { createSimulatedGreenhouse, createSwitchInput } from './greenhouse';
export { DEFAULT_EFFECTS, GREENHOUSE_MODEL } from './helpers';
export type { ActuatorEffect, Conditions, EffectTable, GreenhouseOptions, SimulatedGreenhouse, SwitchInput } from './types';
