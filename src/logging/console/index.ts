export { createConsoleSink, paint } from './console-sink';
