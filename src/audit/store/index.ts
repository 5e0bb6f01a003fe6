export type { AuditStore, AuditFilter } from './interface.js'
export { matchesFilter } from './interface.js'
export { JsonlAuditStore } from './jsonl.js'
export { MemoryAuditStore } from './memory.js'
