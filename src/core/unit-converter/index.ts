export { createUnitConverter } from './unit-converter';
export { deriveDistances, clamp, calibrationFromConfig } from './helpers';
export type { CalibrationConstants, DerivedDistances, UnitConverter } from './types';
