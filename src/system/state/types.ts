/**
 * Control state type definitions
 */

import type { RawTelemetry, SetpointState } from '$types/common';

/**
 * Mutable state owned by the control loop. Collaborators receive the
 * pieces they update (the setpoint holder) and never keep a reference.
 */
export interface ControlState {
  // Telemetry
  raw: RawTelemetry;

  // Setpoint
  setpoint: SetpointState;

  // Timing
  lastReadTime: number;
  lastPushTime: number;
  lastPullTime: number;

  // Error tracking
  consecutiveErrors: number;
}
