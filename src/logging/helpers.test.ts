/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtValue, isLogLevel } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format each level with its tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'm', LOG_LEVELS)).toBe('[DEBUG]    m');
    expect(formatLogMessage(LOG_LEVELS.INFO, 'm', LOG_LEVELS)).toBe('ℹ️ [INFO]     m');
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'm', LOG_LEVELS)).toBe('⚠️ [WARNING]  m');
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'm', LOG_LEVELS)).toBe('🚨 [CRITICAL] m');
  });

  test('should preserve message content exactly', () => {
    const msg = 'air-temp=24.5C, fan on (rule fan-heat)';
    expect(formatLogMessage(LOG_LEVELS.INFO, msg, LOG_LEVELS)).toBe('ℹ️ [INFO]     ' + msg);
  });
});

describe('shouldLog', () => {
  test('should filter below current level', () => {
    const context = { currentLevel: LOG_LEVELS.WARNING, uptimeMs: 0, demoteHours: 0 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
    expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(true);
  });

  test('should demote INFO once uptime exceeds demoteHours', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptimeMs: 2 * 3600000 + 1, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
    expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(true);
  });

  test('should never demote in DEBUG mode', () => {
    const context = { currentLevel: LOG_LEVELS.DEBUG, uptimeMs: 10 * 3600000, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });
});

describe('fmtValue', () => {
  test('should format with one decimal and unit', () => {
    expect(fmtValue(24.46, 'C')).toBe('24.5C');
    expect(fmtValue(61, '%')).toBe('61.0%');
  });

  test('should return n/a for null', () => {
    expect(fmtValue(null, 'C')).toBe('n/a');
  });
});

describe('isLogLevel', () => {
  test('should accept 0-3 only', () => {
    expect(isLogLevel(0)).toBe(true);
    expect(isLogLevel(3)).toBe(true);
    expect(isLogLevel(4)).toBe(false);
    expect(isLogLevel('1')).toBe(false);
  });
});
