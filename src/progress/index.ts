export { AuditLogger, AuditEvent, AuditEventType, AuditLoggerConfig, AuditStatus } from './audit-logger';
export { OrganizationReporter, ReportFormat, formatBytes, formatDuration } from './organization-reporter';
