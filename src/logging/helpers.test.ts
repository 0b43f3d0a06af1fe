/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtPercent, isLogLevel, parseLogLevel } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

const HOUR_MS = 3600 * 1000;

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('ℹ️ [INFO]     test message');
  });

  test('should format WARNING level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('⚠️ [WARNING]  test message');
  });

  test('should format CRITICAL level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('🚨 [CRITICAL] test message');
  });

  test('should preserve message content exactly', () => {
    const msg = 'PV: 37.5%, CO: 41.2%, Setpoint: 85.0%';
    expect(formatLogMessage(LOG_LEVELS.INFO, msg, LOG_LEVELS)).toBe('ℹ️ [INFO]     ' + msg);
  });
});

describe('shouldLog', () => {
  test('should reject levels below current level', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, { currentLevel: LOG_LEVELS.INFO, uptimeMs: 0, demoteHours: 0 }, LOG_LEVELS)).toBe(false);
  });

  test('should accept levels at or above current level', () => {
    const context = { currentLevel: LOG_LEVELS.WARNING, uptimeMs: 0, demoteHours: 0 };

    expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(true);
    expect(shouldLog(LOG_LEVELS.CRITICAL, context, LOG_LEVELS)).toBe(true);
  });

  test('should keep INFO before the demotion threshold', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptimeMs: 2 * HOUR_MS, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });

  test('should demote INFO after the threshold', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptimeMs: 2 * HOUR_MS + 1, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(false);
  });

  test('should never demote WARNING', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptimeMs: 100 * HOUR_MS, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.WARNING, context, LOG_LEVELS)).toBe(true);
  });

  test('should not demote in DEBUG mode', () => {
    const context = { currentLevel: LOG_LEVELS.DEBUG, uptimeMs: 100 * HOUR_MS, demoteHours: 2 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });

  test('should not demote when disabled', () => {
    const context = { currentLevel: LOG_LEVELS.INFO, uptimeMs: 100 * HOUR_MS, demoteHours: 0 };
    expect(shouldLog(LOG_LEVELS.INFO, context, LOG_LEVELS)).toBe(true);
  });
});

describe('fmtPercent', () => {
  test('should format with one decimal and percent sign', () => {
    expect(fmtPercent(37.5)).toBe('37.5%');
    expect(fmtPercent(41.17647)).toBe('41.2%');
    expect(fmtPercent(0)).toBe('0.0%');
  });

  test('should return n/a for null and non-finite values', () => {
    expect(fmtPercent(null)).toBe('n/a');
    expect(fmtPercent(NaN)).toBe('n/a');
  });
});

describe('isLogLevel', () => {
  test('should accept 0 through 3', () => {
    expect([0, 1, 2, 3].every(isLogLevel)).toBe(true);
  });

  test('should reject anything else', () => {
    expect(isLogLevel(4)).toBe(false);
    expect(isLogLevel(-1)).toBe(false);
    expect(isLogLevel(1.5)).toBe(false);
  });
});

describe('parseLogLevel', () => {
  test('should parse names case-insensitively', () => {
    expect(parseLogLevel('debug', LOG_LEVELS)).toBe(0);
    expect(parseLogLevel('Info', LOG_LEVELS)).toBe(1);
    expect(parseLogLevel('WARNING', LOG_LEVELS)).toBe(2);
    expect(parseLogLevel('critical', LOG_LEVELS)).toBe(3);
  });

  test('should accept aliases', () => {
    expect(parseLogLevel('warn', LOG_LEVELS)).toBe(2);
    expect(parseLogLevel('error', LOG_LEVELS)).toBe(3);
  });

  test('should parse digits', () => {
    expect(parseLogLevel('2', LOG_LEVELS)).toBe(2);
  });

  test('should return null for unknown input', () => {
    expect(parseLogLevel('verbose', LOG_LEVELS)).toBeNull();
    expect(parseLogLevel('', LOG_LEVELS)).toBeNull();
    expect(parseLogLevel('7', LOG_LEVELS)).toBeNull();
  });
});
