export { auditRecords, type AuditRecordRow } from './audit-records';
