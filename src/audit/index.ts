export { AuditLog, type AuditLogOptions } from './audit-log.js';
export { MemoryAuditStore, JsonlAuditStore, type AuditStore, type ChainTail, type StoredRecord } from './store.js';
export { AuditEntrySchema } from './schema.js';
