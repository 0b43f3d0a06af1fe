/**
 * Telemetry decoder types
 */

import type { RawTelemetry } from '$types/common';

/**
 * Result of decoding one line from the device.
 * - handshake: the firmware announced it finished resetting
 * - reading: a complete telemetry triple
 * - none: anything else; callers drop it
 */
export type DecodeResult =
  | { kind: 'handshake' }
  | { kind: 'reading'; reading: RawTelemetry }
  | { kind: 'none' };
