import type { AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditStore, type AuditFilter } from './interface.js'

/**
 * In-memory ring of the most recent entries. Used when audit files are
 * disabled, and in tests.
 */
export class MemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = []

  constructor(private readonly maxEntries = 1000) {}

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(sanitizeAuditEntry(entry))
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries)
    }
  }

  /**
   * Query entries, newest first.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const results: AuditEntry[] = []
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i]
      if (!matchesFilter(entry, filter)) continue
      results.push(entry)
      if (filter.limit && results.length >= filter.limit) break
    }
    return results
  }

  get size(): number {
    return this.entries.length
  }
}
