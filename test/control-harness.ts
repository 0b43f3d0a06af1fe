/**
 * Wires a control loop against in-process fakes
 *
 * Real converter, serial link and remote sync; fake port, fake fetch,
 * in-memory audit trail, manual clock and instant delays.
 */

import { buildConfig } from '@boot/config';
import { calibrationFromConfig, createUnitConverter } from '@core/unit-converter';
import type { AuditLog } from '@features/audit-log';
import { createSerialLink } from '@hardware/serial-link';
import { createRemoteSync } from '@network/remote-sync';
import { createInitialState } from '@system/state/state';
import type { ControlState } from '@system/state/types';
import { createControlLoop } from '@system/control';
import type { ControlLoop, ControlLoopDependencies, Controller } from '@system/control';
import type { BridgeConfig, BridgeConfigOverrides, TelemetrySample } from '$types';

import { createFakeFetch } from './fake-fetch';
import type { FakeReply, RecordedRequest } from './fake-fetch';
import { createFakePortFactory } from './fake-serial-port';
import type { FakePortBehaviour, FakePortFactory } from './fake-serial-port';
import { createRecordingLogger } from './recording-logger';
import type { RecordingLogger } from './recording-logger';

export const START_MS = new Date(2024, 0, 1, 12, 0, 0).getTime();

export interface ControlHarnessOptions {
  replies?: FakeReply[];
  plan?: FakePortBehaviour[];
  config?: BridgeConfigOverrides;
  audit?: AuditLog;
  /** Called for every delay after it is recorded */
  onDelay?: (ms: number) => void;
}

export interface ControlHarness {
  config: BridgeConfig;
  state: ControlState;
  loop: ControlLoop;
  /** Step context sharing the harness abort signal */
  ctx: Controller;
  abort: AbortController;
  ports: FakePortFactory;
  requests: RecordedRequest[];
  logger: RecordingLogger;
  samples: TelemetrySample[];
  delays: number[];
  advance(ms: number): void;
  now(): number;
}

export function createControlHarness(options: ControlHarnessOptions = {}): ControlHarness {
  const config = buildConfig({
    SERIAL_PORT: '/dev/ttyFAKE',
    PUSH_URL: 'http://control.test/post',
    PULL_URL: 'http://control.test/get',
    TANK_HEIGHT_CM: 11,
    SENSOR_OFFSET_CM: 1,
    MIN_WATER_HEIGHT_CM: 1,
    MAX_WATER_HEIGHT_CM: 9,
    PUMP_RAW_MIN: 16,
    PUMP_RAW_MAX: 50,
    DEFAULT_SETPOINT: 85,
    ...options.config
  });

  let clock = START_MS;
  const delays: number[] = [];
  const samples: TelemetrySample[] = [];
  const logger = createRecordingLogger();
  const ports = createFakePortFactory(options.plan);
  const fetch = createFakeFetch(options.replies);

  async function delay(ms: number): Promise<void> {
    delays.push(ms);
    if (options.onDelay) {
      options.onDelay(ms);
    }
  }

  const audit: AuditLog = options.audit ?? {
    append: function(sample: TelemetrySample) {
      samples.push(sample);
      return true;
    },
    getPath: function() { return 'memory'; }
  };

  const deps: ControlLoopDependencies = {
    config: config,
    state: createInitialState(clock, config.DEFAULT_SETPOINT),
    link: createSerialLink(config, { createPort: ports.factory, logger: logger, delay: delay }),
    converter: createUnitConverter(calibrationFromConfig(config)),
    remote: createRemoteSync(config, { fetch: fetch.fetch, logger: logger }),
    audit: audit,
    logger: logger,
    clock: function() { return clock; },
    delay: delay
  };

  const abort = new AbortController();

  return {
    config: config,
    state: deps.state,
    loop: createControlLoop(deps),
    ctx: { ...deps, signal: abort.signal },
    abort: abort,
    ports: ports,
    requests: fetch.requests,
    logger: logger,
    samples: samples,
    delays: delays,
    advance: function(ms: number) { clock += ms; },
    now: function() { return clock; }
  };
}
