/**
 * Logging helper functions
 */

import { TIME_CONSTANTS } from '@utils/constants';

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a percentage with one decimal, or "n/a" when absent
 * @param value - Percentage value
 * @returns Formatted percentage string
 */
export function fmtPercent(value: number | null): string {
  if (value === null || !isFinite(value)) return "n/a";
  return value.toFixed(1) + "%";
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptimeMs, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptimeMs > context.demoteHours * TIME_CONSTANTS.MS_PER_HOUR) {
      return false;
    }
  }

  return true;
}

/**
 * Narrow an arbitrary number to a LogLevel
 * @param value - Candidate level from config or CLI
 * @returns True if value is 0, 1, 2 or 3
 */
export function isLogLevel(value: number): value is LogLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/**
 * Resolve a level name (debug/info/warning/critical) or digit to a LogLevel
 * @param name - Level name or number as text
 * @param logLevels - Log level constants object
 * @returns Matching level or null when unknown
 */
export function parseLogLevel(name: string, logLevels: LogLevels): LogLevel | null {
  const key = name.trim().toUpperCase();
  if (key === 'DEBUG') return logLevels.DEBUG;
  if (key === 'INFO') return logLevels.INFO;
  if (key === 'WARNING' || key === 'WARN') return logLevels.WARNING;
  if (key === 'CRITICAL' || key === 'ERROR') return logLevels.CRITICAL;

  const numeric = Number(key);
  if (key !== '' && isLogLevel(numeric)) return numeric;
  return null;
}
