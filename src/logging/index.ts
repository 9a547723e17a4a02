/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering and colours (createConsoleSink)
 * - Slack sink with webhook retry (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtValue, isLogLevel } from './helpers';
export { createConsoleSink, paint } from './console';
export { createSlackSink, createFetchPost } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  HttpPost,
  SlackSink,
  SlackSinkConfig,
  FilterContext,
  InitMessage
} from './types';
