/**
 * Time helper functions
 */

/**
 * Check whether an interval has elapsed since the last run
 *
 * A clock that stepped backwards (NTP correction) counts as elapsed.
 *
 * @param currentMs - Current timestamp
 * @param lastMs - Timestamp of the last run
 * @param intervalMs - Interval length
 * @returns True if the activity is due
 */
export function hasElapsed(currentMs: number, lastMs: number, intervalMs: number): boolean {
  const dt = currentMs - lastMs;
  if (dt < 0) {
    return true;
  }
  return dt >= intervalMs;
}

/**
 * Run a promise with a deadline
 *
 * @param promise - Operation to bound
 * @param timeoutMs - Deadline in milliseconds
 * @param label - Used in the timeout error message
 * @returns The operation's result
 * @throws {Error} "<label> timed out after <n>ms" when the deadline passes first
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>(function(_resolve, reject) {
    timer = setTimeout(function() {
      reject(new Error(label + ' timed out after ' + timeoutMs + 'ms'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
