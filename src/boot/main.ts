#!/usr/bin/env node
/**
 * Tank bridge entry point
 *
 * CLI flags beat BRIDGE_* environment variables (shell or .env file),
 * which beat the defaults in config.ts.
 */

import chalk from 'chalk';

import { cliOverrides, parseCli } from './cli';
import { APP_CONSTANTS, buildConfig } from './config';
import { loadEnvFile, readEnvOverrides } from './env';
import { initialize } from './init';
import { createNodeSerialPort } from '@hardware/serial-link/node-port';
import { delay, nowMs } from '@utils/time';
import { formatIssues } from '@validation';
import { ConfigValidationError, errorMessage } from '$types';

import type { Bridge } from './types';

function boot(): Bridge | null {
  const options = parseCli(process.argv);
  loadEnvFile(options.envFile);

  const env = readEnvOverrides(process.env, APP_CONSTANTS.LOG_LEVELS);
  const config = buildConfig({ ...env.overrides, ...cliOverrides(options) });

  try {
    if (env.errors.length > 0) {
      throw new ConfigValidationError('Invalid configuration', formatIssues(env.errors));
    }
    return initialize(config, {
      createPort: createNodeSerialPort,
      fetch: fetch,
      consoleApi: console,
      clock: nowMs,
      delay: delay
    });
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(chalk.red.bold('INIT FAIL: ' + err.message));
      for (const field of err.fields) {
        console.error('  ' + field);
      }
      return null;
    }
    throw err;
  }
}

const bridge = boot();

if (bridge) {
  const shutdown = function(signal: string): void {
    bridge.logger.info('Received ' + signal + ', shutting down');
    bridge.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  bridge.run().then(
    function() { process.exitCode = 0; },
    function(err: unknown) {
      console.error(chalk.red.bold('Bridge stopped: ' + errorMessage(err)));
      process.exitCode = 1;
    }
  );
} else {
  process.exitCode = 1;
}
