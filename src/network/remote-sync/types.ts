/**
 * Remote sync type definitions
 */

import type { BridgeConfig, SetpointState, TelemetrySample } from '$types';
import type { Logger } from '@logging';

/**
 * The subset of the global fetch the bridge uses
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type RemoteSyncConfig = Pick<BridgeConfig, 'PUSH_URL' | 'PULL_URL' | 'HTTP_TIMEOUT_MS'>;

export interface RemoteSyncDependencies {
  fetch: FetchFn;
  logger: Logger;
}

/**
 * What a pull response said about the setpoint
 */
export type SetpointField =
  | { kind: 'missing' }
  | { kind: 'invalid'; raw: unknown }
  | { kind: 'value'; value: number };

export interface RemoteSync {
  /**
   * Post one telemetry sample
   * @returns True on a 2xx response; failures are logged, never thrown
   */
  push(sample: TelemetrySample): Promise<boolean>;
  /**
   * Fetch the remote setpoint and update the holder when it differs
   * @returns True when the held setpoint changed
   */
  pull(setpoint: SetpointState): Promise<boolean>;
}
