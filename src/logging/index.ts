/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with chalk coloring (createConsoleSink)
 * - File sink (createFileSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtPercent, isLogLevel, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSink,
  FileSinkConfig,
  FilterContext
} from './types';
