/**
 * Unit converter type definitions
 *
 * Maps raw ultrasonic distances and raw pump actuation values onto the
 * percentage scale the control plane and the audit trail use.
 */

import type { RawTelemetry, TelemetrySample } from '$types/common';

/**
 * Calibration constants, fixed for the life of the process
 */
export interface CalibrationConstants {
  /** Inner depth of each tank (cm) */
  tankHeightCm: number;
  /** Height of the sensor face above the tank rim (cm) */
  sensorOffsetCm: number;
  /** Water height read as 0% (cm) */
  minWaterHeightCm: number;
  /** Water height read as 100% (cm) */
  maxWaterHeightCm: number;
  /** Raw pump value read as 0% */
  pumpRawMin: number;
  /** Raw pump value read as 100% */
  pumpRawMax: number;
}

/**
 * Distances derived once from the calibration constants
 */
export interface DerivedDistances {
  /** Sensor face to tank floor (cm) */
  sensorToBottom: number;
  /** Sensor reading when the tank is at MIN water height */
  distanceToEmpty: number;
  /** Sensor reading when the tank is at MAX water height */
  distanceToFull: number;
}

/**
 * Stateless converter bound to one calibration
 */
export interface UnitConverter {
  readonly distances: DerivedDistances;
  sensorToPercent(distance: number): number;
  pumpToPercent(raw: number): number;
  /** Convert a full raw reading into one push tick's sample */
  toSample(raw: RawTelemetry, setpointAtPush: number, timestamp: number): TelemetrySample;
}
