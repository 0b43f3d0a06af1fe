/**
 * State management functions
 * Provides the initial state structure for the control loop
 */

import type { ControlState } from './types';

export * from './types';

/**
 * Create initial control state
 *
 * Raw telemetry starts at zero and is only ever replaced as a whole by a
 * successful decode; the last good reading is kept across ticks.
 *
 * @param nowMs - Current timestamp in milliseconds
 * @param setpoint - Setpoint (%) in effect until the control plane reports one
 * @returns Initial ControlState object with all fields populated
 *
 * @example
 * ```typescript
 * const state = createInitialState(nowMs(), CONFIG.DEFAULT_SETPOINT);
 * ```
 */
export function createInitialState(nowMs: number, setpoint: number): ControlState {
  return {
    // ═══════════════════════════════════════════════════════════════
    // TELEMETRY
    // Last decoded device values. Stale but valid until the next decode.
    // ═══════════════════════════════════════════════════════════════

    raw: { upperDistance: 0, lowerDistance: 0, pumpRaw: 0 },

    // ═══════════════════════════════════════════════════════════════
    // SETPOINT
    // Changed only by a pull that reports a different value.
    // ═══════════════════════════════════════════════════════════════

    setpoint: { value: setpoint },

    // ═══════════════════════════════════════════════════════════════
    // TIMING
    // Activity timers. All reset to "now" once the first connect returns.
    // ═══════════════════════════════════════════════════════════════

    lastReadTime: nowMs,
    lastPushTime: nowMs,
    lastPullTime: nowMs,

    // ═══════════════════════════════════════════════════════════════
    // ERROR TRACKING
    // Consecutive crashed ticks; resets on a clean tick.
    // ═══════════════════════════════════════════════════════════════

    consecutiveErrors: 0
  };
}

/**
 * Set every activity timer to the given time
 */
export function resetTimers(state: ControlState, nowMs: number): void {
  state.lastReadTime = nowMs;
  state.lastPushTime = nowMs;
  state.lastPullTime = nowMs;
}
