import { describe, it, expect } from 'vitest'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import type { AuditEntry } from '../../src/audit/schema.js'

const entry = (id: string, overrides: Partial<AuditEntry> = {}): AuditEntry => ({
  id,
  timestamp: new Date(),
  category: 'platform',
  action: 'environment_provisioned',
  severity: 'info',
  ...overrides,
})

describe('MemoryAuditStore', () => {
  it('returns entries newest first', async () => {
    const store = new MemoryAuditStore()
    await store.append(entry('a'))
    await store.append(entry('b'))

    expect((await store.query({})).map((e) => e.id)).toEqual(['b', 'a'])
  })

  it('keeps only the most recent maxEntries', async () => {
    const store = new MemoryAuditStore(2)
    await store.append(entry('a'))
    await store.append(entry('b'))
    await store.append(entry('c'))

    expect(store.size).toBe(2)
    expect((await store.query({})).map((e) => e.id)).toEqual(['c', 'b'])
  })

  it('filters by severity', async () => {
    const store = new MemoryAuditStore()
    await store.append(entry('a', { severity: 'warning' }))
    await store.append(entry('b'))

    expect((await store.query({ severity: 'warning' })).map((e) => e.id)).toEqual(['a'])
  })

  it('sanitizes on append', async () => {
    const store = new MemoryAuditStore()
    await store.append(entry('a', { metadata: { stderr: 'trace', exitCode: 1 } }))

    const [stored] = await store.query({})
    expect(stored.metadata).toEqual({ exitCode: 1 })
  })
})
