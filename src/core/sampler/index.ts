export { createEnvironmentSampler } from './sampler';
export { buildSensorRegistry, createSourceHealth, updateSourceHealth } from './helpers';
export type {
  EnvironmentSampler,
  RegisteredSensor,
  SamplerConfig,
  SamplerSnapshot,
  SourceHealthChange,
  SourceHealthState,
  SourceStatus
} from './types';
