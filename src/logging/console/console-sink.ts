/**
 * Console output sink with timed buffering
 *
 * - Buffers messages up to a configurable limit
 * - Drains the buffer at fixed intervals, colouring each line by level
 * - Drops messages with warning when buffer overflows
 * - WARNING and CRITICAL lines go to stderr
 */

import chalk, { type ChalkInstance } from 'chalk';

import type { TimerAPI } from '$types';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, LogLevel } from '../types';

interface BufferedLine {
  text: string;
  level: LogLevel;
}

/**
 * Apply the level colour to a line
 * @param painter - Chalk instance
 * @param level - Log level
 * @param text - Line to colour
 * @returns Coloured line
 */
export function paint(painter: ChalkInstance, level: LogLevel, text: string): string {
  if (level === 0) return painter.gray(text);
  if (level === 1) return painter.cyan(text);
  if (level === 2) return painter.yellow(text);
  return painter.red.bold(text);
}

/**
 * Create a console sink with buffering
 *
 * @param timerApi - Timer API for scheduling drain
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, drainInterval)
 * @param painter - Chalk instance; defaults to chalk's auto-detected colour level
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(createNodeTimer(), console, {
 *   bufferSize: 200,
 *   drainInterval: 100
 * });
 * consoleSink.write("Hello world", LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  painter: ChalkInstance = chalk
): ConsoleSink {
  const buffer: BufferedLine[] = [];
  let drainTimerId: number | null = null;

  function emit(line: BufferedLine): void {
    const text = paint(painter, line.level, line.text);
    if (line.level >= 2) {
      consoleApi.warn(text);
    } else {
      consoleApi.log(text);
    }
  }

  /**
   * Drain all buffered lines
   */
  function flush(): void {
    const lines = buffer.splice(0, buffer.length);
    for (let i = 0; i < lines.length; i++) {
      emit(lines[i]);
    }
  }

  function write(formattedMessage: string, level: LogLevel): void {
    if (buffer.length < config.bufferSize) {
      buffer.push({ text: formattedMessage, level: level });
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Start the drain timer (idempotent)
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    if (drainTimerId === null) {
      drainTimerId = timerApi.set(config.drainInterval, true, flush);
    }
    callback(true, 'Console sink initialized');
  }

  function stop(): void {
    flush();
    if (drainTimerId !== null) {
      timerApi.clear(drainTimerId);
      drainTimerId = null;
    }
  }

  return {
    write: write,
    initialize: initialize,
    flush: flush,
    stop: stop,
    getBufferSize: getBufferSize
  };
}
