import type { AuditLogger, AuditOptions } from '../audit/index.js'
import type { ExecutionResult } from './types.js'
import { toErrorMessage } from './errors.js'

/**
 * Write an audit entry without letting a storage failure leak into the
 * execution path. A failed write is reported on stderr.
 */
export async function emit(audit: AuditLogger, options: AuditOptions): Promise<void> {
  try {
    await audit.log(options)
  } catch (error) {
    console.warn(
      `Audit write failed (${options.category}/${options.action}): ${toErrorMessage(error)}`
    )
  }
}

/**
 * Emit audit event for execution start.
 */
export async function auditExecutionStart(
  audit: AuditLogger,
  options: {
    sessionId: string
    path: 'interpreter' | 'command'
    payloadLength: number
    timeoutMs: number
  }
): Promise<void> {
  await emit(audit, {
    category: 'sandbox',
    action: 'execution_started',
    severity: 'debug',
    sessionId: options.sessionId,
    metadata: {
      path: options.path,
      // Only the length: payloads are never logged
      payloadLength: options.payloadLength,
      timeoutMs: options.timeoutMs,
    },
  })
}

/**
 * Emit audit event for execution completion.
 */
export async function auditExecutionComplete(
  audit: AuditLogger,
  options: {
    sessionId: string
    path: 'interpreter' | 'command'
    result: ExecutionResult
  }
): Promise<void> {
  const { result } = options
  const metadata: Record<string, unknown> = {
    path: options.path,
    kind: result.kind,
    executionTime: result.executionTime,
  }

  if (result.kind === 'success') {
    metadata.success = result.success
    metadata.exitCode = result.exitCode
    metadata.truncated = result.truncated
    metadata.stdoutLength = result.stdout.length
    metadata.stderrLength = result.stderr.length
  } else {
    metadata.errorMessage = result.error
  }

  await emit(audit, {
    category: 'sandbox',
    action: 'execution_completed',
    severity: result.kind === 'success' && result.success ? 'info' : 'warning',
    sessionId: options.sessionId,
    metadata,
  })
}

/**
 * Emit audit event for an interpreter session transition.
 */
export async function auditSessionEvent(
  audit: AuditLogger,
  options: {
    sessionId: string
    action: 'started' | 'init_failed' | 'failed' | 'restarted' | 'terminated'
    error?: unknown
    metadata?: Record<string, unknown>
  }
): Promise<void> {
  const severity =
    options.action === 'failed' || options.action === 'init_failed' ? 'warning' : 'info'

  await emit(audit, {
    category: 'session',
    action: `session_${options.action}`,
    severity,
    sessionId: options.sessionId,
    metadata: {
      ...options.metadata,
      ...(options.error !== undefined && { errorMessage: toErrorMessage(options.error) }),
    },
  })
}

/**
 * Emit audit event for running without the tool-module volume.
 */
export async function auditVolumeFallback(
  audit: AuditLogger,
  options: {
    sessionId: string
    volumeName: string
    error: unknown
  }
): Promise<void> {
  await emit(audit, {
    category: 'platform',
    action: 'volume_fallback',
    severity: 'warning',
    sessionId: options.sessionId,
    metadata: {
      volumeName: options.volumeName,
      errorMessage: toErrorMessage(options.error),
      reason: 'Volume unavailable, provisioning environment without it',
    },
  })
}
