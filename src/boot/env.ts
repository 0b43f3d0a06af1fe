/**
 * Environment overrides
 *
 * Every user setting can be set as BRIDGE_<KEY>, either in the process
 * environment or in a .env file loaded with dotenv. Values are parsed by
 * the type of the setting they override; unparsable values are reported
 * as field errors instead of becoming NaN.
 */

import * as dotenv from 'dotenv';

import { parseLogLevel } from '@logging';
import type { LogLevels } from '@logging';
import { addError } from '@validation';
import type { FieldError } from '@validation';
import type { BridgeConfigOverrides, BridgeUserConfig } from '$types';

export const ENV_PREFIX = 'BRIDGE_';

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? K : never }[keyof T];

type LevelKey = 'CONSOLE_LOG_LEVEL' | 'FILE_LOG_LEVEL' | 'GLOBAL_LOG_LEVEL';
type NumberKey = Exclude<KeysOfType<BridgeUserConfig, number>, LevelKey>;
type StringKey = KeysOfType<BridgeUserConfig, string>;
type BooleanKey = KeysOfType<BridgeUserConfig, boolean>;

const STRING_KEYS: readonly StringKey[] = [
  'SERIAL_PORT', 'PUSH_URL', 'PULL_URL', 'AUDIT_LOG_PATH', 'FILE_LOG_PATH'
];

const NUMBER_KEYS: readonly NumberKey[] = [
  'BAUD_RATE', 'SERIAL_IO_TIMEOUT_MS', 'SERIAL_SETTLE_MS', 'RECONNECT_DELAY_MS',
  'SERIAL_READ_INTERVAL_MS', 'PUSH_INTERVAL_MS', 'PULL_INTERVAL_MS', 'LOOP_IDLE_MS',
  'HTTP_TIMEOUT_MS', 'DEFAULT_SETPOINT',
  'TANK_HEIGHT_CM', 'SENSOR_OFFSET_CM', 'MIN_WATER_HEIGHT_CM', 'MAX_WATER_HEIGHT_CM',
  'PUMP_RAW_MIN', 'PUMP_RAW_MAX',
  'GLOBAL_LOG_AUTO_DEMOTE_HOURS'
];

const LEVEL_KEYS: readonly LevelKey[] = ['CONSOLE_LOG_LEVEL', 'FILE_LOG_LEVEL', 'GLOBAL_LOG_LEVEL'];

const BOOLEAN_KEYS: readonly BooleanKey[] = ['CONSOLE_ENABLED', 'CONSOLE_COLOR', 'FILE_LOG_ENABLED'];

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

export interface EnvOverrides {
  overrides: BridgeConfigOverrides;
  errors: FieldError[];
}

/**
 * Load a .env file into process.env
 *
 * Values from the file replace variables already set in the shell.
 *
 * @param path - File to load
 * @returns True when the file was read
 */
export function loadEnvFile(path: string): boolean {
  const result = dotenv.config({ path: path, override: true });
  return result.error === undefined;
}

/**
 * Parse a boolean word (true/false, 1/0, yes/no, on/off)
 * @returns Parsed value or null when unrecognised
 */
export function parseBooleanWord(text: string): boolean | null {
  const word = text.trim().toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  return null;
}

/**
 * Map BRIDGE_* variables onto config overrides
 * @param env - Environment to read (process.env in production)
 * @param logLevels - Level table used to resolve level names
 * @returns Overrides for every recognised variable and errors for unparsable ones
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv, logLevels: LogLevels): EnvOverrides {
  const overrides: BridgeConfigOverrides = {};
  const errors: FieldError[] = [];

  function read(key: string): string | undefined {
    const value = env[ENV_PREFIX + key];
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    return value;
  }

  function reject(key: string, expected: string, value: string): void {
    addError(errors, ENV_PREFIX + key, ENV_PREFIX + key + ' must be ' + expected + ' (got "' + value + '")');
  }

  for (const key of STRING_KEYS) {
    const value = read(key);
    if (value !== undefined) {
      overrides[key] = value.trim();
    }
  }

  for (const key of NUMBER_KEYS) {
    const value = read(key);
    if (value === undefined) continue;
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      overrides[key] = parsed;
    } else {
      reject(key, 'a number', value);
    }
  }

  for (const key of LEVEL_KEYS) {
    const value = read(key);
    if (value === undefined) continue;
    const level = parseLogLevel(value, logLevels);
    if (level !== null) {
      overrides[key] = level;
    } else {
      reject(key, 'a log level (DEBUG, INFO, WARNING, CRITICAL or 0-3)', value);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    const value = read(key);
    if (value === undefined) continue;
    const flag = parseBooleanWord(value);
    if (flag !== null) {
      overrides[key] = flag;
    } else {
      reject(key, 'a boolean (true/false, 1/0, yes/no, on/off)', value);
    }
  }

  return { overrides: overrides, errors: errors };
}
