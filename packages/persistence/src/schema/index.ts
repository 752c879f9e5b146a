/**
 * The events and audit_logs tables, shared by every service, and the column
 * helpers service tables are built from.
 */

export { tsidColumn, timestampColumn, baseEntityColumns } from './common.js';
export { events, type EventRecord } from './events.js';
export { auditLogs, type AuditLogRecord } from './audit-logs.js';
