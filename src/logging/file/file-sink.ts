/**
 * File output sink
 *
 * Appends timestamped log lines to a file, synchronously. A failing disk
 * only increments a counter; the first failure is reported once on the
 * console.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { ConsoleAPI, FileSink, FileSinkConfig, LogLevel } from '../types';

/**
 * Create a file sink
 *
 * @param config - Sink configuration (path)
 * @param timeSource - Clock returning epoch milliseconds, used for the line prefix
 * @param consoleApi - Where the first write failure is reported
 * @returns File sink instance
 */
export function createFileSink(
  config: FileSinkConfig,
  timeSource: () => number,
  consoleApi: ConsoleAPI
): FileSink {
  let failures = 0;
  let directoryReady = false;

  function ensureDirectory(): void {
    if (!directoryReady) {
      fs.mkdirSync(path.dirname(path.resolve(config.path)), { recursive: true });
      directoryReady = true;
    }
  }

  function write(_level: LogLevel, formattedMessage: string): void {
    const line = new Date(timeSource()).toISOString() + ' ' + formattedMessage + '\n';
    try {
      ensureDirectory();
      fs.appendFileSync(config.path, line, 'utf-8');
    } catch (err) {
      failures++;
      if (failures === 1) {
        consoleApi.warn('File log sink failed for ' + config.path + ': ' + String(err));
      }
    }
  }

  return {
    write: write,
    getFailureCount: function() { return failures; }
  };
}
