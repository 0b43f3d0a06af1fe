/**
 * Serial link to the level rig
 *
 * Owns the single port handle and the connection state machine:
 *
 *   disconnected -> connecting -> connected
 *   connected -> disconnected   (error event, close event, failed write)
 *
 * The port handle delivers whole lines; they queue here until the control
 * loop drains them with readAvailable(). Events from a handle that has
 * already been released are ignored. A new handle is only opened once every
 * earlier handle has finished closing, or the I/O timeout has passed.
 */

import { ConnectionLostError, errorMessage } from '$types/errors';
import { decodeLine } from '@core/telemetry-decoder';
import type { DecodeResult } from '@core/telemetry-decoder';
import { withTimeout } from '@utils/time';

import { formatSetpointFrame } from './helpers';
import { CONNECTION_STATES } from './types';
import type {
  ConnectionState,
  SerialLink,
  SerialLinkConfig,
  SerialLinkDependencies,
  SerialPortHandle
} from './types';

/**
 * Create the serial link
 * @param config - Port, timing and framing settings
 * @param deps - Port factory, logger and delay function
 * @returns Serial link instance, initially disconnected
 */
export function createSerialLink(config: SerialLinkConfig, deps: SerialLinkDependencies): SerialLink {
  const logger = deps.logger;
  const ioTimeout = config.SERIAL_IO_TIMEOUT_MS;

  let state: ConnectionState = CONNECTION_STATES.DISCONNECTED;
  let handle: SerialPortHandle | null = null;
  let generation = 0;
  let pending: string[] = [];
  // Closes still in flight, including ports whose open() outlived its deadline
  let releasing: Promise<void> = Promise.resolve();

  // ─────────────────────────────────────────────────────────────
  // Handle lifecycle
  // ─────────────────────────────────────────────────────────────

  function attachPort(): SerialPortHandle {
    generation += 1;
    const own = generation;
    pending = [];

    return deps.createPort(
      { path: config.SERIAL_PORT, baudRate: config.BAUD_RATE, delimiter: config.LINE_TERMINATOR },
      {
        onLine: function(line: string) {
          if (own === generation) {
            enqueue(line.trim());
          }
        },
        onError: function(err: Error) {
          if (own === generation) {
            markLost('Serial error: ' + err.message);
          }
        },
        onClose: function() {
          if (own === generation) {
            markLost('Serial port closed');
          }
        }
      }
    );
  }

  function enqueue(line: string): void {
    if (line.length === 0) {
      return;
    }
    if (line.length > config.MAX_LINE_LENGTH) {
      logger.debug('Discarded ' + line.length + ' characters of overlong input');
      return;
    }
    pending.push(line);
    if (pending.length > config.MAX_PENDING_LINES) {
      pending.shift();
      logger.debug('Input backlog full, dropped the oldest line');
    }
  }

  function track(work: Promise<void>): void {
    releasing = Promise.all([releasing, work]).then(function() {});
  }

  async function closePort(port: SerialPortHandle): Promise<void> {
    try {
      await withTimeout(port.close(), ioTimeout, 'Serial close');
    } catch (err) {
      logger.debug('Serial close failed: ' + errorMessage(err));
    }
  }

  function releaseHandle(): Promise<void> {
    const old = handle;
    handle = null;
    generation += 1;
    pending = [];

    if (old === null || !old.isOpen()) {
      return Promise.resolve();
    }
    const closing = closePort(old);
    track(closing);
    return closing;
  }

  async function awaitReleased(): Promise<void> {
    try {
      await withTimeout(releasing, ioTimeout, 'Serial release');
    } catch (err) {
      logger.debug('Opening a new handle anyway: ' + errorMessage(err));
      releasing = Promise.resolve();
    }
  }

  function markLost(reason: string): void {
    if (state !== CONNECTION_STATES.CONNECTED) {
      return;
    }
    logger.warning(reason + ', reconnecting');
    state = CONNECTION_STATES.DISCONNECTED;
    track(releaseHandle());
  }

  async function sendFrame(port: SerialPortHandle, setpoint: number): Promise<string> {
    const frame = formatSetpointFrame(setpoint, config.SETPOINT_FRAME_PREFIX, config.LINE_TERMINATOR);
    await withTimeout(port.flush(), ioTimeout, 'Serial flush');
    await withTimeout(port.write(frame), ioTimeout, 'Serial write');
    return frame.trim();
  }

  /**
   * One connection attempt
   * @returns False when the signal aborted during the settle wait
   */
  async function attempt(setpoint: number, signal?: AbortSignal): Promise<boolean> {
    await releaseHandle();
    await awaitReleased();
    const port = attachPort();
    handle = port;

    const opening = port.open();
    try {
      await withTimeout(opening, ioTimeout, 'Serial open');
    } catch (err) {
      // An open that completes after the deadline still holds the device
      track(opening.then(
        function() { return closePort(port); },
        function(lateErr: unknown) { logger.debug('Late serial open failed: ' + errorMessage(lateErr)); }
      ));
      throw err;
    }
    await withTimeout(port.flush(), ioTimeout, 'Serial flush');
    // The board resets when the port opens
    await deps.delay(config.SERIAL_SETTLE_MS, signal);
    if (signal?.aborted) {
      return false;
    }

    const frame = await sendFrame(port, setpoint);
    logger.debug('Sent ' + frame);
    return true;
  }

  // ─────────────────────────────────────────────────────────────
  // Public API
  // ─────────────────────────────────────────────────────────────

  async function connect(setpoint: number, signal?: AbortSignal): Promise<boolean> {
    let attempts = 0;

    while (!signal?.aborted) {
      attempts += 1;
      state = CONNECTION_STATES.CONNECTING;

      try {
        const connected = await attempt(setpoint, signal);
        if (!connected) {
          break;
        }
        state = CONNECTION_STATES.CONNECTED;
        logger.info('Connected to ' + config.SERIAL_PORT + ' at ' + config.BAUD_RATE + ' baud');
        return true;
      } catch (err) {
        state = CONNECTION_STATES.DISCONNECTED;
        await releaseHandle();
        logger.warning(
          'Serial connect attempt ' + attempts + ' failed: ' + errorMessage(err) +
          ', retrying in ' + config.RECONNECT_DELAY_MS + 'ms'
        );
        await deps.delay(config.RECONNECT_DELAY_MS, signal);
      }
    }

    state = CONNECTION_STATES.DISCONNECTED;
    await releaseHandle();
    return false;
  }

  async function write(setpoint: number): Promise<void> {
    const port = handle;
    if (state !== CONNECTION_STATES.CONNECTED || port === null) {
      throw new ConnectionLostError('Serial link is not connected');
    }

    try {
      const frame = await sendFrame(port, setpoint);
      logger.info('Setpoint sent: ' + frame);
    } catch (err) {
      state = CONNECTION_STATES.DISCONNECTED;
      await releaseHandle();
      throw new ConnectionLostError('Serial write failed: ' + errorMessage(err));
    }
  }

  function hasPendingInput(): boolean {
    return pending.length > 0;
  }

  function readAvailable(): DecodeResult[] {
    const lines = pending;
    pending = [];

    const results: DecodeResult[] = [];
    for (const line of lines) {
      const result = decodeLine(line, config.HANDSHAKE_TOKEN);
      if (result.kind === 'none') {
        logger.debug('Ignored line: ' + line);
      }
      results.push(result);
    }
    return results;
  }

  function isConnected(): boolean {
    return state === CONNECTION_STATES.CONNECTED && handle !== null && handle.isOpen();
  }

  async function close(): Promise<void> {
    const wasOpen = handle !== null;
    state = CONNECTION_STATES.DISCONNECTED;
    await releaseHandle();
    if (wasOpen) {
      logger.info('Serial port released');
    }
  }

  return {
    getState: function() { return state; },
    isConnected: isConnected,
    connect: connect,
    write: write,
    hasPendingInput: hasPendingInput,
    readAvailable: readAvailable,
    close: close
  };
}
