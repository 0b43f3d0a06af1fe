/**
 * Bridge initialization
 */

import { calibrationFromConfig, createUnitConverter } from '@core/unit-converter';
import { createAuditLog } from '@features/audit-log';
import { createSerialLink } from '@hardware/serial-link';
import { createConsoleSink, createFileSink, createLogger, fmtPercent, isLogLevel } from '@logging';
import { createRemoteSync } from '@network/remote-sync';
import { createControlLoop } from '@system/control';
import { createInitialState } from '@system/state/state';
import { formatIssues, validateConfig } from '@validation';
import { ConfigValidationError } from '$types';

import type { LogLevel, LogLevels, SinkWithLevel } from '@logging';
import type { BridgeConfig } from '$types';
import type { BootDependencies, Bridge } from './types';

function toLogLevel(value: number, logLevels: LogLevels): LogLevel {
  return isLogLevel(value) ? value : logLevels.INFO;
}

/**
 * Validate the configuration and wire every component
 *
 * @param config - Merged configuration
 * @param deps - Host services (serial port factory, fetch, console, clock, delay)
 * @returns Bridge ready to run
 * @throws {ConfigValidationError} listing every field error
 */
export function initialize(config: BridgeConfig, deps: BootDependencies): Bridge {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigValidationError('Invalid configuration', formatIssues(validation.errors));
  }

  const LOG_LEVELS = config.LOG_LEVELS;

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({
      sink: createConsoleSink(deps.consoleApi, { color: config.CONSOLE_COLOR }, LOG_LEVELS),
      minLevel: toLogLevel(config.CONSOLE_LOG_LEVEL, LOG_LEVELS)
    });
  }
  if (config.FILE_LOG_ENABLED) {
    sinks.push({
      sink: createFileSink({ path: config.FILE_LOG_PATH }, deps.clock, deps.consoleApi),
      minLevel: toLogLevel(config.FILE_LOG_LEVEL, LOG_LEVELS)
    });
  }

  const logger = createLogger({
    level: toLogLevel(config.GLOBAL_LOG_LEVEL, LOG_LEVELS),
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.clock,
    sinks: sinks
  }, LOG_LEVELS);

  logger.info('Tank bridge starting on ' + config.SERIAL_PORT + ' at ' + config.BAUD_RATE + ' baud');
  logger.info('Push ' + config.PUSH_URL + ' | Pull ' + config.PULL_URL + ' | Setpoint ' + fmtPercent(config.DEFAULT_SETPOINT) + ' | Audit ' + config.AUDIT_LOG_PATH);

  // Warnings after the title so they are not lost above it
  for (const line of formatIssues(validation.warnings)) {
    logger.warning(line);
  }

  const state = createInitialState(deps.clock(), config.DEFAULT_SETPOINT);
  const link = createSerialLink(config, { createPort: deps.createPort, logger: logger, delay: deps.delay });

  const loop = createControlLoop({
    config: config,
    state: state,
    link: link,
    converter: createUnitConverter(calibrationFromConfig(config)),
    remote: createRemoteSync(config, { fetch: deps.fetch, logger: logger }),
    audit: createAuditLog(config, { logger: logger }),
    logger: logger,
    clock: deps.clock,
    delay: deps.delay
  });

  async function run(): Promise<void> {
    try {
      await loop.run();
    } finally {
      await link.close();
      logger.info('Cleanup complete');
    }
  }

  return {
    config: config,
    logger: logger,
    state: state,
    link: link,
    loop: loop,
    run: run,
    stop: function() { loop.stop(); }
  };
}
