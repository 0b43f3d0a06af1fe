/**
 * Global error types for the tank bridge
 *
 * Only the startup validation errors are ever fatal. Serial errors drive the
 * reconnection state machine and never escape the control loop.
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the merged configuration fails validation
 */
export class ConfigValidationError extends ValidationError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

/**
 * Error thrown when calibration constants are degenerate
 * (full distance not strictly closer than empty, or an empty pump range)
 */
export class CalibrationValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'CalibrationValidationError';
  }
}

/**
 * Base error for serial port failures
 */
export class SerialIOError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SerialIOError';
  }
}

/**
 * Raised by a write that failed and dropped the connection.
 * The link is already disconnected when this is thrown.
 */
export class ConnectionLostError extends SerialIOError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionLostError';
  }
}

/**
 * HTTP exchange with the control plane failed (status, network, timeout or body)
 */
export class RemoteSyncError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'RemoteSyncError';
    this.status = status;
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
