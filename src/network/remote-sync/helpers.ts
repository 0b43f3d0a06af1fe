/**
 * Control-plane payload helpers
 */

import type { TelemetrySample } from '$types/common';

import type { SetpointField } from './types';

/**
 * Form body for a telemetry push
 */
export function buildPushBody(sample: TelemetrySample): URLSearchParams {
  return new URLSearchParams({
    upper_percent: String(sample.upperPercent),
    pump_percent: String(sample.pumpPercent),
    lower_percent: String(sample.lowerPercent)
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the setpoint out of a decoded pull response
 *
 * Numbers and numeric strings are accepted; anything else non-empty is
 * reported as invalid.
 */
export function readSetpointField(body: unknown): SetpointField {
  if (!isRecord(body) || body.setpoint === undefined || body.setpoint === null) {
    return { kind: 'missing' };
  }

  const raw = body.setpoint;
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { kind: 'value', value: raw } : { kind: 'invalid', raw: raw };
  }
  if (typeof raw === 'string' && raw.trim().length > 0) {
    const value = Number(raw.trim());
    return Number.isFinite(value) ? { kind: 'value', value: value } : { kind: 'invalid', raw: raw };
  }
  return { kind: 'invalid', raw: raw };
}
