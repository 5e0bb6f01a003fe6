import { z } from 'zod'

/**
 * Audit entry schema with coerced date for JSON serialization.
 *
 * When serialized to JSON, Date becomes an ISO string; z.coerce.date()
 * turns it back into a Date on read.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: z.enum(['sandbox', 'session', 'platform', 'gateway', 'config']),
  action: z.string(),
  severity: z.enum(['debug', 'info', 'warning', 'alert', 'critical']),
  requestId: z.string().optional(),
  sessionId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
})

export type AuditEntry = z.infer<typeof AuditEntrySchema>
