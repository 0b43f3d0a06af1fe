/**
 * CSV formatting for the audit trail
 */

import type { TelemetrySample } from '$types/common';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format epoch milliseconds as local `YYYY-MM-DD HH:mm:ss`
 */
export function formatLocalTimestamp(timestampMs: number): string {
  const date = new Date(timestampMs);
  return date.getFullYear() + '-' + pad2(date.getMonth() + 1) + '-' + pad2(date.getDate()) +
    ' ' + pad2(date.getHours()) + ':' + pad2(date.getMinutes()) + ':' + pad2(date.getSeconds());
}

/**
 * One audit row: timestamp, PV (upper level), CO (pump), setpoint
 */
export function formatAuditRow(sample: TelemetrySample): string {
  return [
    formatLocalTimestamp(sample.timestamp),
    sample.upperPercent.toFixed(1),
    sample.pumpPercent.toFixed(1),
    sample.setpointAtPush.toFixed(1)
  ].join(',');
}
