import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import { SEVERITY_RANK, type AuditCategory, type AuditSeverity } from './types.js'
import type { AuditStore, AuditFilter } from './store/interface.js'
import { JsonlAuditStore } from './store/jsonl.js'
import { MemoryAuditStore } from './store/memory.js'
import { relayPaths } from '../config/paths.js'
import type { LoggingConfig } from '../config/schema.js'

/**
 * Options for creating an audit entry.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  requestId?: string
  sessionId?: string
  metadata?: Record<string, unknown>
}

export interface AuditLoggerOptions {
  /** Entries below this severity are dropped. */
  minSeverity?: AuditSeverity
}

/**
 * Audit logger service.
 *
 * Provides a simple interface for logging audit events.
 * All entries are sanitized by the store before storage.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minRank: number

  constructor(store?: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store ?? new JsonlAuditStore(relayPaths().auditDir)
    this.minRank = SEVERITY_RANK[options.minSeverity ?? 'debug']
  }

  /**
   * Log an audit entry.
   */
  async log(options: AuditOptions): Promise<void> {
    const severity = options.severity ?? 'info'
    if (SEVERITY_RANK[severity] < this.minRank) return

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      category: options.category,
      action: options.action,
      severity,
      requestId: options.requestId,
      sessionId: options.sessionId,
      metadata: options.metadata,
    }

    await this.store.append(entry)
  }

  async debug(category: AuditCategory, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.log({ category, action, severity: 'debug', metadata })
  }

  async info(category: AuditCategory, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.log({ category, action, severity: 'info', metadata })
  }

  async warning(category: AuditCategory, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.log({ category, action, severity: 'warning', metadata })
  }

  async alert(category: AuditCategory, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.log({ category, action, severity: 'alert', metadata })
  }

  async critical(category: AuditCategory, action: string, metadata?: Record<string, unknown>): Promise<void> {
    await this.log({ category, action, severity: 'critical', metadata })
  }

  /**
   * Query the audit store.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter)
  }
}

const LEVEL_TO_SEVERITY: Record<LoggingConfig['level'], AuditSeverity> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'alert',
}

/**
 * Build the audit logger described by the logging config: daily JSONL
 * files when audit is enabled, an in-memory ring otherwise.
 */
export function createAuditLogger(config: LoggingConfig, auditDir = relayPaths().auditDir): AuditLogger {
  const store = config.audit.enabled
    ? new JsonlAuditStore(auditDir)
    : new MemoryAuditStore(config.audit.maxEntries)
  return new AuditLogger(store, { minSeverity: LEVEL_TO_SEVERITY[config.level] })
}
