/**
 * Audit module
 *
 * @module audit
 */

export type { AuditEntry, AuditEvent, AuditLog, OverriddenFinding } from './types';
export { AuditWriteError } from './types';
export { DEFAULT_MAX_ATTEMPTS, FileAuditLog, auditFileName } from './file-log';
export type { FileAuditLogOptions } from './file-log';
