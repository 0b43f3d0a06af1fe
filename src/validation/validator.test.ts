/**
 * Tests for configuration validator
 */

import { USER_CONFIG } from '@boot/config';
import type { BridgeUserConfig } from '$types';

import { formatIssues, validateConfig } from './validator';

function configWith(overrides: Partial<BridgeUserConfig>): BridgeUserConfig {
  return { ...USER_CONFIG, ...overrides };
}

function errorFields(config: BridgeUserConfig): string[] {
  return validateConfig(config).errors.map((e) => e.field);
}

describe('validateConfig', () => {
  it('should accept the defaults without errors or warnings', () => {
    const result = validateConfig(USER_CONFIG);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  describe('serial link', () => {
    it('should reject an empty port path', () => {
      expect(errorFields(configWith({ SERIAL_PORT: '' }))).toEqual(['SERIAL_PORT']);
    });

    it('should reject a fractional baud rate', () => {
      expect(errorFields(configWith({ BAUD_RATE: 9600.5 }))).toEqual(['BAUD_RATE']);
    });

    it('should reject an I/O timeout below 100ms', () => {
      expect(errorFields(configWith({ SERIAL_IO_TIMEOUT_MS: 10 }))).toEqual(['SERIAL_IO_TIMEOUT_MS']);
    });

    it('should warn about a very short reconnect delay', () => {
      const result = validateConfig(configWith({ RECONNECT_DELAY_MS: 500 }));

      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['RECONNECT_DELAY_MS']);
    });
  });

  describe('timing', () => {
    it('should reject a zero push interval', () => {
      expect(errorFields(configWith({ PUSH_INTERVAL_MS: 0 }))).toEqual(['PUSH_INTERVAL_MS']);
    });

    it('should warn when the idle sleep exceeds an interval', () => {
      const result = validateConfig(configWith({ LOOP_IDLE_MS: 800, PULL_INTERVAL_MS: 500 }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{
        level: 'WARNING',
        field: 'LOOP_IDLE_MS',
        message: 'LOOP_IDLE_MS (800) exceeds the shortest push/pull interval (500); ticks will run late'
      }]);
    });
  });

  describe('control plane', () => {
    it('should reject malformed URLs', () => {
      expect(errorFields(configWith({ PUSH_URL: 'not a url', PULL_URL: 'ws://host/get' })))
        .toEqual(['PUSH_URL', 'PULL_URL']);
    });

    it('should warn about a setpoint outside 0-100', () => {
      const result = validateConfig(configWith({ DEFAULT_SETPOINT: 120 }));

      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['DEFAULT_SETPOINT']);
    });

    it('should reject a non-finite setpoint', () => {
      expect(errorFields(configWith({ DEFAULT_SETPOINT: NaN }))).toEqual(['DEFAULT_SETPOINT']);
    });
  });

  describe('calibration', () => {
    it('should reject inverted water heights', () => {
      expect(errorFields(configWith({ MIN_WATER_HEIGHT_CM: 10, MAX_WATER_HEIGHT_CM: 2.5 })))
        .toEqual(['MAX_WATER_HEIGHT_CM']);
    });

    it('should reject equal water heights', () => {
      expect(errorFields(configWith({ MIN_WATER_HEIGHT_CM: 5, MAX_WATER_HEIGHT_CM: 5 })))
        .toEqual(['MAX_WATER_HEIGHT_CM']);
    });

    it('should reject a full level above the sensor', () => {
      const result = validateConfig(configWith({ SENSOR_OFFSET_CM: 2, MAX_WATER_HEIGHT_CM: 14 }));

      expect(result.errors.map((e) => e.message)).toEqual([
        'MAX_WATER_HEIGHT_CM puts the full surface 1cm above the sensor'
      ]);
    });

    it('should reject an offset at least the tank height', () => {
      expect(errorFields(configWith({ SENSOR_OFFSET_CM: 15 }))).toContain('SENSOR_OFFSET_CM');
    });

    it('should reject an empty pump range', () => {
      expect(errorFields(configWith({ PUMP_RAW_MIN: 50, PUMP_RAW_MAX: 50 }))).toEqual(['PUMP_RAW_MAX']);
    });
  });

  describe('logging', () => {
    it('should reject log levels outside 0-3', () => {
      expect(errorFields(configWith({ CONSOLE_LOG_LEVEL: 4, FILE_LOG_LEVEL: -1, GLOBAL_LOG_LEVEL: 1.5 })))
        .toEqual(['CONSOLE_LOG_LEVEL', 'FILE_LOG_LEVEL', 'GLOBAL_LOG_LEVEL']);
    });

    it('should require a log path only when the file sink is on', () => {
      expect(errorFields(configWith({ FILE_LOG_ENABLED: false, FILE_LOG_PATH: '' }))).toEqual([]);
      expect(errorFields(configWith({ FILE_LOG_ENABLED: true, FILE_LOG_PATH: '' }))).toEqual(['FILE_LOG_PATH']);
    });

    it('should warn when every sink is disabled', () => {
      const result = validateConfig(configWith({ CONSOLE_ENABLED: false, FILE_LOG_ENABLED: false }));

      expect(result.warnings.map((w) => w.field)).toEqual(['CONSOLE_ENABLED']);
    });

    it('should reject an empty audit path', () => {
      expect(errorFields(configWith({ AUDIT_LOG_PATH: '' }))).toEqual(['AUDIT_LOG_PATH']);
    });
  });
});

describe('formatIssues', () => {
  it('should render one "FIELD: message" line per issue', () => {
    expect(formatIssues([
      { field: 'BAUD_RATE', message: 'bad' },
      { field: 'PUSH_URL', message: 'worse' }
    ])).toEqual(['BAUD_RATE: bad', 'PUSH_URL: worse']);
  });
});
