import { describe, it, expect, vi, afterEach } from 'vitest'
import { attempt } from '../../src/sandbox/cleanup.js'
import { emit } from '../../src/sandbox/audit.js'
import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import type { AuditStore } from '../../src/audit/store/interface.js'

describe('attempt', () => {
  it('returns true when the step succeeds', async () => {
    const store = new MemoryAuditStore()

    const ok = await attempt(new AuditLogger(store), 'kill_failed', async () => undefined)

    expect(ok).toBe(true)
    expect(store.size).toBe(0)
  })

  it('records a failed step as a warning and returns false', async () => {
    const store = new MemoryAuditStore()

    const ok = await attempt(
      new AuditLogger(store),
      'environment_terminate_failed',
      async () => {
        throw new Error('sandbox already gone')
      },
      { category: 'platform', sessionId: 'alice', metadata: { environmentId: 'env-1' } }
    )

    expect(ok).toBe(false)
    const [entry] = await store.query({})
    expect(entry).toMatchObject({
      category: 'platform',
      action: 'environment_terminate_failed',
      severity: 'warning',
      sessionId: 'alice',
      metadata: { environmentId: 'env-1', errorMessage: 'sandbox already gone' },
    })
  })

  it('defaults to the session category', async () => {
    const store = new MemoryAuditStore()

    await attempt(new AuditLogger(store), 'kill_failed', async () => {
      throw new Error('no such process')
    })

    const [entry] = await store.query({})
    expect(entry.category).toBe('session')
  })
})

describe('emit', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('reports a failed audit write on stderr instead of throwing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const failing: AuditStore = {
      append: async () => {
        throw new Error('disk full')
      },
      query: async () => [],
    }

    await expect(
      emit(new AuditLogger(failing), { category: 'sandbox', action: 'execution_started' })
    ).resolves.toBeUndefined()

    expect(warn).toHaveBeenCalledWith('Audit write failed (sandbox/execution_started): disk full')
  })
})
