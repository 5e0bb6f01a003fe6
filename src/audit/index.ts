// Schema and types
export { AuditEntrySchema, type AuditEntry } from './schema.js'
export { SEVERITY_RANK, type AuditCategory, type AuditSeverity } from './types.js'

// Redaction
export { sanitizeAuditEntry, sanitizeErrorMessage } from './redaction.js'

// Store
export type { AuditStore, AuditFilter } from './store/index.js'
export { JsonlAuditStore, MemoryAuditStore, matchesFilter } from './store/index.js'

// Service
export {
  AuditLogger,
  createAuditLogger,
  type AuditOptions,
  type AuditLoggerOptions,
} from './service.js'
