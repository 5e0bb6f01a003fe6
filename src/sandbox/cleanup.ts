import type { AuditCategory, AuditLogger } from '../audit/index.js'
import { emit } from './audit.js'
import { toErrorMessage } from './errors.js'

export interface AttemptContext {
  category?: AuditCategory
  sessionId?: string
  metadata?: Record<string, unknown>
}

/**
 * Run a best-effort teardown step. A failure is recorded as a warning
 * and reported through the return value; it never propagates, so later
 * steps (and restarts) still run.
 */
export async function attempt(
  audit: AuditLogger,
  action: string,
  fn: () => Promise<unknown>,
  context: AttemptContext = {}
): Promise<boolean> {
  try {
    await fn()
    return true
  } catch (error) {
    await emit(audit, {
      category: context.category ?? 'session',
      action,
      severity: 'warning',
      sessionId: context.sessionId,
      metadata: {
        ...context.metadata,
        errorMessage: toErrorMessage(error),
      },
    })
    return false
  }
}
