/**
 * Unit converter helper functions
 */

import type { BridgeConfig } from '$types/config';
import { CalibrationValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { CalibrationConstants, DerivedDistances } from './types';

/**
 * Validate calibration constants and derive sensor distances
 *
 * @param calibration - Calibration constants
 * @returns Distances to empty and full surface
 * @throws {CalibrationValidationError} If a constant is not finite, the full
 *   distance is not strictly below the empty distance, or the pump range is empty
 */
export function deriveDistances(calibration: CalibrationConstants): DerivedDistances {
  const fields: (keyof CalibrationConstants)[] = [
    'tankHeightCm', 'sensorOffsetCm', 'minWaterHeightCm', 'maxWaterHeightCm', 'pumpRawMin', 'pumpRawMax'
  ];
  for (const field of fields) {
    if (!isFiniteNumber(calibration[field])) {
      throw new CalibrationValidationError(field + " must be a finite number, got " + calibration[field]);
    }
  }

  const sensorToBottom = calibration.tankHeightCm - calibration.sensorOffsetCm;
  const distanceToEmpty = sensorToBottom - calibration.minWaterHeightCm;
  const distanceToFull = sensorToBottom - calibration.maxWaterHeightCm;

  if (distanceToFull >= distanceToEmpty) {
    throw new CalibrationValidationError(
      "Distance to full (" + distanceToFull + ") must be less than distance to empty (" + distanceToEmpty + ")"
    );
  }

  if (calibration.pumpRawMax <= calibration.pumpRawMin) {
    throw new CalibrationValidationError(
      "pumpRawMax (" + calibration.pumpRawMax + ") must be greater than pumpRawMin (" + calibration.pumpRawMin + ")"
    );
  }

  return {
    sensorToBottom: sensorToBottom,
    distanceToEmpty: distanceToEmpty,
    distanceToFull: distanceToFull
  };
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(Math.min(value, max), min);
}

/**
 * Pick the calibration constants out of the bridge configuration
 */
export function calibrationFromConfig(
  config: Pick<
    BridgeConfig,
    'TANK_HEIGHT_CM' | 'SENSOR_OFFSET_CM' | 'MIN_WATER_HEIGHT_CM' | 'MAX_WATER_HEIGHT_CM' | 'PUMP_RAW_MIN' | 'PUMP_RAW_MAX'
  >
): CalibrationConstants {
  return {
    tankHeightCm: config.TANK_HEIGHT_CM,
    sensorOffsetCm: config.SENSOR_OFFSET_CM,
    minWaterHeightCm: config.MIN_WATER_HEIGHT_CM,
    maxWaterHeightCm: config.MAX_WATER_HEIGHT_CM,
    pumpRawMin: config.PUMP_RAW_MIN,
    pumpRawMax: config.PUMP_RAW_MAX
  };
}
