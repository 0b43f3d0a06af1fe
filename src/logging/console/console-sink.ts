/**
 * Console output sink
 *
 * Routes formatted lines to the console stream matching their severity
 * and, when enabled, colors them by level with chalk.
 */

import { Chalk } from 'chalk';

import type { LogLevel, LogLevels, LogSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink
 *
 * DEBUG and INFO go to `log`, WARNING to `warn`, CRITICAL to `error`.
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @param logLevels - Log level constants object
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { color: true }, LOG_LEVELS);
 * consoleSink.write(LOG_LEVELS.WARNING, "⚠️ [WARNING]  POST error: timeout");
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  logLevels: LogLevels
): LogSink {
  // level 0 makes every chalk call an identity function
  const paint = new Chalk({ level: config.color ? 1 : 0 });

  function write(level: LogLevel, formattedMessage: string): void {
    if (level === logLevels.CRITICAL) {
      consoleApi.error(paint.red.bold(formattedMessage));
    } else if (level === logLevels.WARNING) {
      consoleApi.warn(paint.yellow(formattedMessage));
    } else if (level === logLevels.DEBUG) {
      consoleApi.log(paint.gray(formattedMessage));
    } else {
      consoleApi.log(formattedMessage);
    }
  }

  return {
    write: write
  };
}
