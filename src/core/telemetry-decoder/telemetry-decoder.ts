/**
 * Device line decoding
 *
 * The firmware prints either its handshake token after a reset or a
 * telemetry triple `<upper cm>,<lower cm>,<pump raw>` per sample.
 */

import { parseFloatField, parseIntegerField } from './helpers';
import type { DecodeResult } from './types';

const NONE: DecodeResult = { kind: 'none' };

/**
 * Decode one line received from the device
 * @param line - Line text without its terminator
 * @param handshakeToken - Token whose presence anywhere in the line marks a handshake
 * @returns Handshake, reading or none
 */
export function decodeLine(line: string, handshakeToken: string): DecodeResult {
  if (handshakeToken.length > 0 && line.includes(handshakeToken)) {
    return { kind: 'handshake' };
  }

  const fields = line.split(',');
  if (fields.length !== 3) {
    return NONE;
  }

  const upperDistance = parseFloatField(fields[0]);
  const lowerDistance = parseFloatField(fields[1]);
  const pumpRaw = parseIntegerField(fields[2]);
  if (upperDistance === null || lowerDistance === null || pumpRaw === null) {
    return NONE;
  }

  return {
    kind: 'reading',
    reading: { upperDistance: upperDistance, lowerDistance: lowerDistance, pumpRaw: pumpRaw }
  };
}
