/**
 * Level and pump unit conversion
 *
 * ## Business Context
 * Each tank has an ultrasonic sensor looking down at the water. A shorter
 * distance means more water, so the level percentage falls as the
 * distance grows. Readings outside the calibrated band (splashes, echoes
 * off the rim) are clamped to the nearest bound.
 *
 * The pump value is mapped linearly over its calibrated raw range with
 * no upper clamp: a raw value above the range reads above 100%, and a
 * positive value below the range reads negative. Only raw <= 0 (pump off)
 * is pinned to 0%.
 */

import type { RawTelemetry, TelemetrySample } from '$types/common';

import { clamp, deriveDistances } from './helpers';
import type { CalibrationConstants, UnitConverter } from './types';

/**
 * Create a converter for one calibration
 *
 * Calibration is checked once here; a degenerate configuration throws
 * at startup.
 *
 * @param calibration - Calibration constants
 * @returns Converter with precomputed distances
 * @throws {CalibrationValidationError} If the calibration is degenerate
 *
 * @example
 * ```typescript
 * const converter = createUnitConverter({
 *   tankHeightCm: 15, sensorOffsetCm: 1.3,
 *   minWaterHeightCm: 2.5, maxWaterHeightCm: 10,
 *   pumpRawMin: 16, pumpRawMax: 50
 * });
 * converter.sensorToPercent(11.2); // 0
 * converter.sensorToPercent(3.7);  // 100
 * ```
 */
export function createUnitConverter(calibration: CalibrationConstants): UnitConverter {
  const distances = deriveDistances(calibration);
  const toEmpty = distances.distanceToEmpty;
  const toFull = distances.distanceToFull;
  const pumpMin = calibration.pumpRawMin;
  const pumpSpan = calibration.pumpRawMax - calibration.pumpRawMin;

  function sensorToPercent(distance: number): number {
    const reading = clamp(distance, toFull, toEmpty);
    return ((toEmpty - reading) / (toEmpty - toFull)) * 100;
  }

  function pumpToPercent(raw: number): number {
    if (raw <= 0) {
      return 0;
    }
    return ((raw - pumpMin) / pumpSpan) * 100;
  }

  function toSample(raw: RawTelemetry, setpointAtPush: number, timestamp: number): TelemetrySample {
    return {
      upperPercent: sensorToPercent(raw.upperDistance),
      lowerPercent: sensorToPercent(raw.lowerDistance),
      pumpPercent: pumpToPercent(raw.pumpRaw),
      setpointAtPush: setpointAtPush,
      timestamp: timestamp
    };
  }

  return {
    distances: distances,
    sensorToPercent: sensorToPercent,
    pumpToPercent: pumpToPercent,
    toSample: toSample
  };
}
