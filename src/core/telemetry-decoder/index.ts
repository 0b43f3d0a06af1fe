export { decodeLine } from './telemetry-decoder';
export { parseFloatField, parseIntegerField } from './helpers';
export type { DecodeResult } from './types';
