/**
 * Serial framing helpers
 */

/**
 * Render a setpoint the way the firmware parses it.
 * Integral values keep one decimal (90 -> "90.0").
 */
export function formatSetpoint(value: number): string {
  if (Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}

/**
 * Build the outbound setpoint frame
 * @param value - Setpoint in percent
 * @param prefix - Frame prefix ("SP:")
 * @param terminator - Line terminator ("\n")
 * @returns e.g. "SP:90.0\n"
 */
export function formatSetpointFrame(value: number, prefix: string, terminator: string): string {
  return prefix + formatSetpoint(value) + terminator;
}
