/**
 * Type definition for tank bridge configuration
 */

import type { LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for wiring, timing, calibration and observability
 */
export interface BridgeUserConfig {
  // ───────── SERIAL LINK ─────────
  readonly SERIAL_PORT: string;
  readonly BAUD_RATE: number;
  readonly SERIAL_IO_TIMEOUT_MS: number;
  readonly SERIAL_SETTLE_MS: number;
  readonly RECONNECT_DELAY_MS: number;

  // ───────── LOOP TIMING ─────────
  readonly SERIAL_READ_INTERVAL_MS: number;
  readonly PUSH_INTERVAL_MS: number;
  readonly PULL_INTERVAL_MS: number;
  readonly LOOP_IDLE_MS: number;

  // ───────── CONTROL PLANE ─────────
  readonly PUSH_URL: string;
  readonly PULL_URL: string;
  readonly HTTP_TIMEOUT_MS: number;
  readonly DEFAULT_SETPOINT: number;

  // ───────── CALIBRATION ─────────
  readonly TANK_HEIGHT_CM: number;
  readonly SENSOR_OFFSET_CM: number;
  readonly MIN_WATER_HEIGHT_CM: number;
  readonly MAX_WATER_HEIGHT_CM: number;
  readonly PUMP_RAW_MIN: number;
  readonly PUMP_RAW_MAX: number;

  // ───────── AUDIT TRAIL ─────────
  readonly AUDIT_LOG_PATH: string;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;
  readonly CONSOLE_COLOR: boolean;

  // ───────── FILE LOG SETTINGS ─────────
  readonly FILE_LOG_ENABLED: boolean;
  readonly FILE_LOG_LEVEL: number;
  readonly FILE_LOG_PATH: string;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Wire-protocol and file-format details that only change with the firmware or consumers
 */
export interface BridgeAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── WIRE PROTOCOL ─────────
  readonly HANDSHAKE_TOKEN: string;
  readonly SETPOINT_FRAME_PREFIX: string;
  readonly LINE_TERMINATOR: string;
  readonly MAX_LINE_LENGTH: number;
  readonly MAX_PENDING_LINES: number;

  // ───────── AUDIT TRAIL ─────────
  readonly AUDIT_LOG_HEADER: readonly string[];

  // ───────── LOOP SUPERVISION ─────────
  readonly MAX_CONSECUTIVE_ERRORS: number;
}

/**
 * Complete bridge configuration
 * Combines user config and app constants
 */
export type BridgeConfig = BridgeUserConfig & BridgeAppConstants;

/**
 * Partial user config used for environment and CLI overrides
 */
export type BridgeConfigOverrides = {
  -readonly [K in keyof BridgeUserConfig]?: BridgeUserConfig[K];
};
