import type { AuditEntry } from './schema.js'

/**
 * Metadata fields that must NEVER appear in audit logs: snippet source,
 * shell commands and captured output. Callers log lengths instead.
 */
const NEVER_LOG_FIELDS = ['code', 'command', 'stdout', 'stderr', 'output']

/**
 * Maximum length for error messages in audit logs.
 */
export const MAX_ERROR_MESSAGE_LENGTH = 500

/**
 * Sanitize an audit entry before it is stored.
 *
 * This is the single choke point: every store calls it on append.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  const sanitized = structuredClone(entry)
  const metadata = sanitized.metadata
  if (!metadata) return sanitized

  for (const field of NEVER_LOG_FIELDS) {
    delete metadata[field]
  }

  if (metadata.errorMessage !== undefined) {
    metadata.errorMessage = sanitizeErrorMessage(String(metadata.errorMessage))
  }

  return sanitized
}

/**
 * Truncate an error message; collapse it to one line.
 */
export function sanitizeErrorMessage(msg: string): string {
  return msg.replace(/\s*\n\s*/g, ' ').slice(0, MAX_ERROR_MESSAGE_LENGTH)
}
