import { mkdir, appendFile, readFile, readdir } from 'fs/promises'
import path from 'path'
import type { AuditEntry } from '../schema.js'
import { AuditEntrySchema } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import { matchesFilter, type AuditStore, type AuditFilter } from './interface.js'

const FILE_PATTERN = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/

/**
 * JSONL-based audit store with daily file rotation.
 *
 * File naming: audit-YYYY-MM-DD.jsonl
 * Location: <home>/logs/audit/
 */
export class JsonlAuditStore implements AuditStore {
  private initialized = false

  constructor(private readonly baseDir: string) {}

  async append(entry: AuditEntry): Promise<void> {
    if (!this.initialized) {
      await mkdir(this.baseDir, { recursive: true })
      this.initialized = true
    }

    // Sanitize before writing - this is the choke point
    const sanitized = sanitizeAuditEntry(entry)
    const line = JSON.stringify(sanitized) + '\n'

    await appendFile(this.getFilePath(sanitized.timestamp), line, 'utf-8')
  }

  /**
   * Query entries, newest file first.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const results: AuditEntry[] = []

    for (const file of await this.getRelevantFiles(filter)) {
      for (const entry of await this.readEntries(file)) {
        if (!matchesFilter(entry, filter)) continue
        results.push(entry)
        if (filter.limit && results.length >= filter.limit) {
          return results
        }
      }
    }

    return results
  }

  private getFilePath(date: Date): string {
    const yyyy = date.getFullYear()
    const mm = String(date.getMonth() + 1).padStart(2, '0')
    const dd = String(date.getDate()).padStart(2, '0')
    return path.join(this.baseDir, `audit-${yyyy}-${mm}-${dd}.jsonl`)
  }

  /**
   * Files whose day overlaps the filter's date range, newest first.
   */
  private async getRelevantFiles(filter: AuditFilter): Promise<string[]> {
    let files: string[]
    try {
      files = await readdir(this.baseDir)
    } catch {
      return []
    }

    return files
      .filter((file) => {
        const match = FILE_PATTERN.exec(file)
        if (!match) return false

        const dayStart = new Date(`${match[1]}T00:00:00`)
        const nextDay = new Date(dayStart)
        nextDay.setDate(nextDay.getDate() + 1)

        if (filter.since && nextDay <= filter.since) return false
        if (filter.until && dayStart > filter.until) return false
        return true
      })
      .sort()
      .reverse()
  }

  /**
   * Parse entries from a file. Malformed lines are skipped.
   */
  private async readEntries(filename: string): Promise<AuditEntry[]> {
    const content = await readFile(path.join(this.baseDir, filename), 'utf-8')
    const entries: AuditEntry[] = []

    for (const line of content.split('\n')) {
      if (!line.trim()) continue

      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        continue
      }

      const result = AuditEntrySchema.safeParse(parsed)
      if (result.success) entries.push(result.data)
    }

    return entries
  }
}
