/**
 * Tests for command-line parsing
 */

import { buildProgram, cliOverrides, parseCli } from './cli';
import { buildConfig } from './config';

function argv(...args: string[]): string[] {
  return ['node', 'tank-bridge', ...args];
}

describe('parseCli', () => {
  it('should default only the env file', () => {
    expect(parseCli(argv())).toEqual({ envFile: '.env' });
  });

  it('should parse every flag', () => {
    const options = parseCli(argv(
      '--port', '/dev/ttyACM1',
      '--baud', '115200',
      '--push-url', 'http://control.test/post',
      '--pull-url', 'http://control.test/get',
      '--audit-file', 'runs/today.csv',
      '--log-level', 'debug',
      '--log-file', 'logs/run.log',
      '--setpoint', '60.5',
      '--env-file', 'rig.env'
    ));

    expect(options).toEqual({
      port: '/dev/ttyACM1',
      baud: 115200,
      pushUrl: 'http://control.test/post',
      pullUrl: 'http://control.test/get',
      auditFile: 'runs/today.csv',
      logLevel: 0,
      logFile: 'logs/run.log',
      setpoint: 60.5,
      envFile: 'rig.env'
    });
  });

  it('should accept numeric log levels', () => {
    expect(parseCli(argv('-l', '2')).logLevel).toBe(2);
  });
});

describe('argument errors', () => {
  function parseWithErrors(...args: string[]): string {
    let output = '';
    const program = buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: function(text: string) { output += text; } });
    expect(() => program.parse(argv(...args))).toThrow();
    return output;
  }

  it('should reject a non-numeric baud rate', () => {
    expect(parseWithErrors('--baud', 'fast')).toContain('Not a number.');
  });

  it('should reject a fractional baud rate', () => {
    expect(parseWithErrors('--baud', '9600.5')).toContain('Not a positive integer.');
  });

  it('should reject an unknown log level', () => {
    expect(parseWithErrors('--log-level', 'loud')).toContain('Expected debug, info, warning, critical or 0-3.');
  });
});

describe('cliOverrides', () => {
  it('should leave unset flags undefined so defaults survive', () => {
    const config = buildConfig(cliOverrides({ envFile: '.env' }));

    expect(config.SERIAL_PORT).toBe('/dev/ttyUSB0');
    expect(config.FILE_LOG_ENABLED).toBe(false);
  });

  it('should apply the log level to the console and the logger', () => {
    const overrides = cliOverrides({ envFile: '.env', logLevel: 3 });

    expect(overrides.CONSOLE_LOG_LEVEL).toBe(3);
    expect(overrides.GLOBAL_LOG_LEVEL).toBe(3);
  });

  it('should enable the file log when a path is given', () => {
    const config = buildConfig(cliOverrides({ envFile: '.env', logFile: 'logs/run.log', setpoint: 70 }));

    expect(config.FILE_LOG_ENABLED).toBe(true);
    expect(config.FILE_LOG_PATH).toBe('logs/run.log');
    expect(config.DEFAULT_SETPOINT).toBe(70);
  });
});
