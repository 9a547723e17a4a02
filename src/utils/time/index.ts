export { nowMs, createNodeTimer, withTimeout } from './time';
export { parseTimeOfDay, minuteOfDay, isWithinWindow } from './helpers';
