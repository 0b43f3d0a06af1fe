/**
 * Common type definitions used throughout the project
 */

/**
 * Unconverted values as last decoded from the device.
 * Replaced as a whole on every successful decode, never field by field.
 */
export interface RawTelemetry {
  /** Distance from the upper tank sensor to the water surface (cm) */
  upperDistance: number;
  /** Distance from the lower tank sensor to the water surface (cm) */
  lowerDistance: number;
  /** Raw pump actuation value reported by the firmware */
  pumpRaw: number;
}

/**
 * Locally held setpoint (percent). Mutable holder so the owner can hand
 * it to collaborators that update it in place.
 */
export interface SetpointState {
  value: number;
}

/**
 * One push tick worth of converted telemetry
 */
export interface TelemetrySample {
  upperPercent: number;
  lowerPercent: number;
  pumpPercent: number;
  /** Setpoint in effect when the sample was taken */
  setpointAtPush: number;
  /** Epoch milliseconds */
  timestamp: number;
}

/**
 * Sleep function; resolves early when the signal aborts
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Clock returning epoch milliseconds
 */
export type ClockFn = () => number;
