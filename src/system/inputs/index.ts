export { createInputQueue, debounceKey } from './input-queue';
export type { InputQueue, InputQueueConfig } from './input-queue';
