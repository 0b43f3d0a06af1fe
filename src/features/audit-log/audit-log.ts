/**
 * CSV audit trail of every push tick
 *
 * The header is written only when the file does not exist yet, so an
 * existing trail keeps growing across restarts.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import { errorMessage } from '$types/errors';
import type { TelemetrySample } from '$types/common';

import { formatAuditRow } from './helpers';
import type { AuditLog, AuditLogConfig, AuditLogDependencies } from './types';

/**
 * Create the audit log writer
 * @param config - File path and header columns
 * @param deps - Logger for write failures
 * @returns Audit log instance
 */
export function createAuditLog(config: AuditLogConfig, deps: AuditLogDependencies): AuditLog {
  const path = config.AUDIT_LOG_PATH;
  const header = config.AUDIT_LOG_HEADER.join(',');

  function append(sample: TelemetrySample): boolean {
    try {
      if (!existsSync(path)) {
        mkdirSync(dirname(path), { recursive: true });
        appendFileSync(path, header + '\n');
      }
      appendFileSync(path, formatAuditRow(sample) + '\n');
      return true;
    } catch (err) {
      deps.logger.warning('Audit log write failed: ' + errorMessage(err));
      return false;
    }
  }

  return {
    append: append,
    getPath: function() { return path; }
  };
}
