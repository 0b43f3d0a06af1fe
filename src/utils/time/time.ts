/**
 * Time utility functions
 */

import { setTimeout as sleep } from 'timers/promises';

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Wait for the given duration
 *
 * Resolves early (without throwing) when the signal aborts, so a shutdown
 * during a reconnect back-off or idle sleep unwinds normally.
 *
 * @param ms - Duration in milliseconds
 * @param signal - Optional abort signal
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }

  try {
    await sleep(ms, undefined, { signal: signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      return;
    }
    throw err;
  }
}
