/**
 * Unit tests for logger coordinator
 */

import type { Mock } from 'vitest';

import { createLogger } from './logger';
import type { LogLevels, LogSink, SinkWithLevel } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

const HOUR_MS = 3600000;

describe('createLogger', () => {
  let clock: number;
  let write: Mock;
  let entry: SinkWithLevel;

  function timeSource(): number {
    return clock;
  }

  beforeEach(() => {
    clock = 0;
    write = vi.fn();
    entry = { sink: { write: write }, minLevel: LOG_LEVELS.DEBUG };
  });

  describe('log level methods', () => {
    test('should tag debug messages', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.debug('test debug');

      expect(write).toHaveBeenCalledWith('[DEBUG]    test debug', LOG_LEVELS.DEBUG);
    });

    test('should tag info, warning and critical messages', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.info('a');
      logger.warning('b');
      logger.critical('c');

      expect(write.mock.calls).toEqual([
        ['ℹ️ [INFO]     a', LOG_LEVELS.INFO],
        ['⚠️ [WARNING]  b', LOG_LEVELS.WARNING],
        ['🚨 [CRITICAL] c', LOG_LEVELS.CRITICAL]
      ]);
    });

    test('should log via generic log method', () => {
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(write).toHaveBeenCalledWith('⚠️ [WARNING]  generic log', LOG_LEVELS.WARNING);
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.debug('should not appear');

      expect(write).not.toHaveBeenCalled();
    });

    test('should filter based on new level after setLevel', () => {
      const logger = createLogger({ level: LOG_LEVELS.WARNING, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.info('before setLevel');
      expect(write).not.toHaveBeenCalled();

      logger.setLevel(LOG_LEVELS.INFO);
      logger.info('after setLevel');

      expect(logger.getLevel()).toBe(LOG_LEVELS.INFO);
      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('auto-demotion', () => {
    test('should demote INFO after demoteHours of uptime', () => {
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 24 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.info('early');
      clock = 25 * HOUR_MS;
      logger.info('late');
      logger.warning('still visible');

      expect(write.mock.calls).toEqual([
        ['ℹ️ [INFO]     early', LOG_LEVELS.INFO],
        ['⚠️ [WARNING]  still visible', LOG_LEVELS.WARNING]
      ]);
    });
  });

  describe('multiple sinks', () => {
    test('should filter by per-sink minLevel', () => {
      const consoleWrite = vi.fn();
      const slackWrite = vi.fn();
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        {
          timeSource: timeSource,
          sinks: [
            { sink: { write: consoleWrite }, minLevel: LOG_LEVELS.INFO },
            { sink: { write: slackWrite }, minLevel: LOG_LEVELS.WARNING }
          ]
        },
        LOG_LEVELS
      );

      logger.info('test info');
      expect(consoleWrite).toHaveBeenCalledTimes(1);
      expect(slackWrite).not.toHaveBeenCalled();

      logger.warning('test warning');
      expect(consoleWrite).toHaveBeenCalledTimes(2);
      expect(slackWrite).toHaveBeenCalledTimes(1);
    });

    test('should continue to other sinks if one throws', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const broken: LogSink = {
        write: function() {
          throw new Error('Sink error');
        }
      };

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: timeSource, sinks: [{ sink: broken, minLevel: LOG_LEVELS.INFO }, entry] },
        LOG_LEVELS
      );

      logger.info('test message');

      expect(write).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: Sink error');
    });
  });

  describe('initialize', () => {
    test('should collect messages from sinks that have initialize', () => {
      const callback = vi.fn();
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        {
          timeSource: timeSource,
          sinks: [
            entry,
            {
              sink: {
                write: vi.fn(),
                initialize: function(cb: (success: boolean, message: string) => void) { cb(false, 'Sink 2 failed'); }
              },
              minLevel: LOG_LEVELS.INFO
            }
          ]
        },
        LOG_LEVELS
      );

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, [{ success: false, message: 'Sink 2 failed' }]);
    });

    test('should call back immediately when no sink needs initialization', () => {
      const callback = vi.fn();
      const logger = createLogger({ level: LOG_LEVELS.INFO, demoteHours: 0 }, { timeSource: timeSource, sinks: [entry] }, LOG_LEVELS);

      logger.initialize(callback);

      expect(callback).toHaveBeenCalledWith(true, []);
    });
  });

  describe('flush', () => {
    test('should flush sinks that buffer', () => {
      const flush = vi.fn();
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: timeSource, sinks: [entry, { sink: { write: vi.fn(), flush: flush }, minLevel: LOG_LEVELS.INFO }] },
        LOG_LEVELS
      );

      logger.flush();

      expect(flush).toHaveBeenCalledTimes(1);
    });
  });
});
