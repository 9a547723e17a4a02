export { readSensor } from './sensors';
export { canonicalUnit, fahrenheitToCelsius, isWithinRange, normalizeReading } from './helpers';
export type { NormalizedValue } from './types';
