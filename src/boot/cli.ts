/**
 * Command-line interface
 *
 * Flags override both the defaults and BRIDGE_* environment variables.
 */

import { Command, InvalidArgumentError } from 'commander';

import { APP_CONSTANTS } from './config';
import { parseLogLevel } from '@logging';
import type { LogLevel } from '@logging';
import type { BridgeConfigOverrides } from '$types';

export type CliOptions = {
  port?: string;
  baud?: number;
  pushUrl?: string;
  pullUrl?: string;
  auditFile?: string;
  logLevel?: LogLevel;
  logFile?: string;
  setpoint?: number;
  envFile: string;
};

function parseNumberArg(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseIntegerArg(value: string): number {
  const parsed = parseNumberArg(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function parseLevelArg(value: string): LogLevel {
  const level = parseLogLevel(value, APP_CONSTANTS.LOG_LEVELS);
  if (level === null) {
    throw new InvalidArgumentError('Expected debug, info, warning, critical or 0-3.');
  }
  return level;
}

/**
 * Build the tank-bridge command
 * @returns Unparsed commander program
 */
export function buildProgram(): Command {
  return new Command()
    .name('tank-bridge')
    .description('Bridge a two-tank level rig on a serial port to an HTTP control plane')
    .option('-p, --port <path>', 'Serial device path')
    .option('-b, --baud <rate>', 'Serial baud rate', parseIntegerArg)
    .option('--push-url <url>', 'Telemetry push endpoint')
    .option('--pull-url <url>', 'Setpoint pull endpoint')
    .option('-a, --audit-file <path>', 'CSV audit trail path')
    .option('-l, --log-level <level>', 'Console and global log level (debug, info, warning, critical)', parseLevelArg)
    .option('--log-file <path>', 'Also write log lines to this file')
    .option('-s, --setpoint <percent>', 'Setpoint used until the control plane sends one', parseNumberArg)
    .option('-e, --env-file <path>', 'Environment file with BRIDGE_* settings', '.env');
}

/**
 * Map parsed flags onto config overrides
 * @param options - Result of program.opts()
 * @returns Overrides for every flag that was given
 */
export function cliOverrides(options: CliOptions): BridgeConfigOverrides {
  const overrides: BridgeConfigOverrides = {
    SERIAL_PORT: options.port,
    BAUD_RATE: options.baud,
    PUSH_URL: options.pushUrl,
    PULL_URL: options.pullUrl,
    AUDIT_LOG_PATH: options.auditFile,
    DEFAULT_SETPOINT: options.setpoint
  };

  if (options.logLevel !== undefined) {
    overrides.CONSOLE_LOG_LEVEL = options.logLevel;
    overrides.GLOBAL_LOG_LEVEL = options.logLevel;
  }

  if (options.logFile !== undefined) {
    overrides.FILE_LOG_ENABLED = true;
    overrides.FILE_LOG_PATH = options.logFile;
  }

  return overrides;
}

/**
 * Parse an argument vector
 * @param argv - Full process.argv style vector
 * @returns Parsed options
 */
export function parseCli(argv: readonly string[]): CliOptions {
  const program = buildProgram();
  program.parse([...argv]);
  return program.opts<CliOptions>();
}
