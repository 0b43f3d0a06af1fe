/**
 * Control module type definitions
 */

import type { AuditLog } from '@features/audit-log';
import type { UnitConverter } from '@core/unit-converter';
import type { SerialLink } from '@hardware/serial-link';
import type { Logger } from '@logging';
import type { RemoteSync } from '@network/remote-sync';
import type { ControlState } from '@system/state/types';
import type { BridgeConfig, ClockFn, DelayFn } from '$types';

export type ControlLoopConfig = Pick<
  BridgeConfig,
  | 'SERIAL_READ_INTERVAL_MS'
  | 'PUSH_INTERVAL_MS'
  | 'PULL_INTERVAL_MS'
  | 'LOOP_IDLE_MS'
  | 'MAX_CONSECUTIVE_ERRORS'
>;

export interface ControlLoopDependencies {
  config: ControlLoopConfig;
  state: ControlState;
  link: SerialLink;
  converter: UnitConverter;
  remote: RemoteSync;
  audit: AuditLog;
  logger: Logger;
  clock: ClockFn;
  delay: DelayFn;
}

/**
 * Everything one tick step needs, plus the loop's abort signal
 */
export interface Controller extends ControlLoopDependencies {
  signal: AbortSignal;
}

export interface ControlLoop {
  /**
   * Initial blocking connect, then reset every timer
   * @returns False when stopped before a connection was made
   */
  start(): Promise<boolean>;
  /** One scheduler pass: read, push, pull, reconnect */
  tick(): Promise<void>;
  /** start() then tick until stop() */
  run(): Promise<void>;
  /** Abort the loop, including a blocked connect or idle sleep */
  stop(): void;
  isRunning(): boolean;
}
