/**
 * Audit event categories.
 */
export type AuditCategory =
  | 'sandbox' // Code and command execution
  | 'session' // Interpreter session lifecycle
  | 'platform' // Environment provisioning and teardown
  | 'gateway' // HTTP surface
  | 'config' // Config loading

/**
 * Audit event severity levels.
 */
export type AuditSeverity = 'debug' | 'info' | 'warning' | 'alert' | 'critical'

export const SEVERITY_RANK: Record<AuditSeverity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  alert: 3,
  critical: 4,
}

// NOTE: AuditEntry is defined in schema.ts and re-exported from index.ts
