export { sha256, hashObject, hashRecord, GENESIS_HASH } from './hasher.js';
export { AuditLog, REPLYGUARD_VERSION, type AuditEntry, type AuditVerification } from './audit-log.js';
