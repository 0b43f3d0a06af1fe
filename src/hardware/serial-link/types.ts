/**
 * Serial link type definitions
 */

import type { BridgeConfig, DelayFn } from '$types';
import type { Logger } from '@logging';
import type { DecodeResult } from '@core/telemetry-decoder';

export const CONNECTION_STATES = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  CONNECTED: 'connected'
} as const;

export type ConnectionState = typeof CONNECTION_STATES[keyof typeof CONNECTION_STATES];

/**
 * Options used to construct one port handle
 */
export interface SerialPortOptions {
  path: string;
  baudRate: number;
  /** Line delimiter the handle splits incoming data on */
  delimiter: string;
}

/**
 * Callbacks a port handle invokes for unsolicited events
 */
export interface SerialPortListeners {
  /** One complete line, without its delimiter */
  onLine(line: string): void;
  onError(err: Error): void;
  onClose(): void;
}

/**
 * Promise-based view of one OS serial port.
 * A handle is opened at most once; a new connection gets a new handle.
 */
export interface SerialPortHandle {
  isOpen(): boolean;
  open(): Promise<void>;
  /** Discard pending input and output */
  flush(): Promise<void>;
  /** Write and wait until the data has been transmitted */
  write(data: string): Promise<void>;
  close(): Promise<void>;
}

export type SerialPortFactory = (options: SerialPortOptions, listeners: SerialPortListeners) => SerialPortHandle;

export type SerialLinkConfig = Pick<
  BridgeConfig,
  | 'SERIAL_PORT'
  | 'BAUD_RATE'
  | 'SERIAL_IO_TIMEOUT_MS'
  | 'SERIAL_SETTLE_MS'
  | 'RECONNECT_DELAY_MS'
  | 'HANDSHAKE_TOKEN'
  | 'SETPOINT_FRAME_PREFIX'
  | 'LINE_TERMINATOR'
  | 'MAX_LINE_LENGTH'
  | 'MAX_PENDING_LINES'
>;

export interface SerialLinkDependencies {
  createPort: SerialPortFactory;
  logger: Logger;
  delay: DelayFn;
}

export interface SerialLink {
  getState(): ConnectionState;
  isConnected(): boolean;
  /**
   * Connect, retrying until it succeeds or the signal aborts
   * @returns True once connected, false when aborted
   */
  connect(setpoint: number, signal?: AbortSignal): Promise<boolean>;
  /**
   * Send a setpoint frame
   * @throws {ConnectionLostError} when not connected or the write fails
   */
  write(setpoint: number): Promise<void>;
  /** True when at least one line is queued */
  hasPendingInput(): boolean;
  /** Drain and decode every queued line */
  readAvailable(): DecodeResult[];
  close(): Promise<void>;
}
