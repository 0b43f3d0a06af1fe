/**
 * Startup validation of the bridge configuration
 *
 * Errors stop the bridge before it touches the serial port; warnings are
 * logged and the bridge starts anyway.
 */

import type { BridgeUserConfig } from '$types';

import {
  addError,
  addWarning,
  validateBoolean,
  validateHttpUrl,
  validateIntegerRange,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';
import type { FieldError, FieldWarning, ValidationResult } from './types';

const LOG_LEVEL_MIN = 0;
const LOG_LEVEL_MAX = 3;

export function validateConfig(config: BridgeUserConfig): ValidationResult {
  const errors: FieldError[] = [];
  const warnings: FieldWarning[] = [];

  // Serial link
  validateNonEmptyString(config.SERIAL_PORT, 'SERIAL_PORT', errors);
  validateIntegerRange(config.BAUD_RATE, 'BAUD_RATE', 50, 4000000, errors, warnings);
  validateNumberRange(config.SERIAL_IO_TIMEOUT_MS, 'SERIAL_IO_TIMEOUT_MS', 100, 30000, errors, warnings);
  validateNumberRange(config.SERIAL_SETTLE_MS, 'SERIAL_SETTLE_MS', 0, 10000, errors, warnings);
  validateNumberRange(config.RECONNECT_DELAY_MS, 'RECONNECT_DELAY_MS', 100, 600000, errors, warnings, 1000, 60000);

  // Loop timing
  validateNumberRange(config.SERIAL_READ_INTERVAL_MS, 'SERIAL_READ_INTERVAL_MS', 0, 60000, errors, warnings);
  validateNumberRange(config.PUSH_INTERVAL_MS, 'PUSH_INTERVAL_MS', 100, 3600000, errors, warnings);
  validateNumberRange(config.PULL_INTERVAL_MS, 'PULL_INTERVAL_MS', 100, 3600000, errors, warnings);
  validateNumberRange(config.LOOP_IDLE_MS, 'LOOP_IDLE_MS', 1, 1000, errors, warnings);

  const shortestInterval = Math.min(config.PUSH_INTERVAL_MS, config.PULL_INTERVAL_MS);
  if (config.LOOP_IDLE_MS > shortestInterval) {
    addWarning(warnings, 'LOOP_IDLE_MS', `LOOP_IDLE_MS (${config.LOOP_IDLE_MS}) exceeds the shortest push/pull interval (${shortestInterval}); ticks will run late`);
  }

  // Control plane
  validateHttpUrl(config.PUSH_URL, 'PUSH_URL', errors);
  validateHttpUrl(config.PULL_URL, 'PULL_URL', errors);
  validateNumberRange(config.HTTP_TIMEOUT_MS, 'HTTP_TIMEOUT_MS', 100, 60000, errors, warnings);
  validateNumberRange(config.DEFAULT_SETPOINT, 'DEFAULT_SETPOINT', -1e6, 1e6, errors, warnings, 0, 100);

  // Calibration
  validateNumberRange(config.TANK_HEIGHT_CM, 'TANK_HEIGHT_CM', 1, 1000, errors, warnings);
  validateNumberRange(config.SENSOR_OFFSET_CM, 'SENSOR_OFFSET_CM', 0, 1000, errors, warnings);
  validateNumberRange(config.MIN_WATER_HEIGHT_CM, 'MIN_WATER_HEIGHT_CM', 0, 1000, errors, warnings);
  validateNumberRange(config.MAX_WATER_HEIGHT_CM, 'MAX_WATER_HEIGHT_CM', 0, 1000, errors, warnings);
  validateNumberRange(config.PUMP_RAW_MIN, 'PUMP_RAW_MIN', -1e6, 1e6, errors, warnings);
  validateNumberRange(config.PUMP_RAW_MAX, 'PUMP_RAW_MAX', -1e6, 1e6, errors, warnings);

  if (config.SENSOR_OFFSET_CM >= config.TANK_HEIGHT_CM) {
    addError(errors, 'SENSOR_OFFSET_CM', 'SENSOR_OFFSET_CM must be less than TANK_HEIGHT_CM');
  }
  if (config.MAX_WATER_HEIGHT_CM <= config.MIN_WATER_HEIGHT_CM) {
    addError(errors, 'MAX_WATER_HEIGHT_CM', 'MAX_WATER_HEIGHT_CM must be greater than MIN_WATER_HEIGHT_CM');
  }
  const distanceToFull = config.TANK_HEIGHT_CM - config.SENSOR_OFFSET_CM - config.MAX_WATER_HEIGHT_CM;
  if (distanceToFull < 0) {
    addError(errors, 'MAX_WATER_HEIGHT_CM', `MAX_WATER_HEIGHT_CM puts the full surface ${-distanceToFull}cm above the sensor`);
  }
  if (config.PUMP_RAW_MAX <= config.PUMP_RAW_MIN) {
    addError(errors, 'PUMP_RAW_MAX', 'PUMP_RAW_MAX must be greater than PUMP_RAW_MIN');
  }

  // Audit trail
  validateNonEmptyString(config.AUDIT_LOG_PATH, 'AUDIT_LOG_PATH', errors);

  // Logging
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateBoolean(config.CONSOLE_COLOR, 'CONSOLE_COLOR', errors);
  validateBoolean(config.FILE_LOG_ENABLED, 'FILE_LOG_ENABLED', errors);
  validateIntegerRange(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', LOG_LEVEL_MIN, LOG_LEVEL_MAX, errors, warnings);
  validateIntegerRange(config.FILE_LOG_LEVEL, 'FILE_LOG_LEVEL', LOG_LEVEL_MIN, LOG_LEVEL_MAX, errors, warnings);
  validateIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', LOG_LEVEL_MIN, LOG_LEVEL_MAX, errors, warnings);
  validateNumberRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 0, 720, errors, warnings);
  if (config.FILE_LOG_ENABLED) {
    validateNonEmptyString(config.FILE_LOG_PATH, 'FILE_LOG_PATH', errors);
  }
  if (!config.CONSOLE_ENABLED && !config.FILE_LOG_ENABLED) {
    addWarning(warnings, 'CONSOLE_ENABLED', 'All log sinks are disabled; the bridge will run silently');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * One line per issue, "FIELD: message"
 */
export function formatIssues(issues: (FieldError | FieldWarning)[]): string[] {
  return issues.map(function(issue) { return issue.field + ': ' + issue.message; });
}
