export { createAuditLog } from './audit-log';
export { formatAuditRow, formatLocalTimestamp } from './helpers';
export type { AuditLog, AuditLogConfig, AuditLogDependencies } from './types';
