/**
 * Audit log types
 */

import type { BridgeConfig, TelemetrySample } from '$types';
import type { Logger } from '@logging';

export type AuditLogConfig = Pick<BridgeConfig, 'AUDIT_LOG_PATH' | 'AUDIT_LOG_HEADER'>;

export interface AuditLogDependencies {
  logger: Logger;
}

export interface AuditLog {
  /**
   * Append one row, writing the header first when the file is new
   * @returns True when the row was written
   */
  append(sample: TelemetrySample): boolean;
  getPath(): string;
}
