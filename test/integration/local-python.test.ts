/**
 * End-to-end runs on the local platform with a real python3.
 *
 * Skipped when python3 is not on PATH.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { execFileSync } from 'child_process'
import { mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { SandboxExecutor } from '../../src/sandbox/executor.js'
import { LocalPlatform } from '../../src/platform/local.js'
import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import { AppConfigSchema } from '../../src/config/schema.js'

function hasPython(): boolean {
  try {
    execFileSync('python3', ['--version'], { stdio: 'ignore' })
    return true
  } catch {
    return false
  }
}

const config = AppConfigSchema.parse({
  platform: { provider: 'local', volume: { enabled: false } },
  interpreter: { initCode: 'import json' },
  execution: { defaultTimeoutMs: 10000, startTimeoutMs: 10000, terminateGraceMs: 1000 },
})

describe.skipIf(!hasPython())('local platform with python3', () => {
  let baseDir: string
  let executor: SandboxExecutor

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'relay-e2e-'))
    executor = SandboxExecutor.fromConfig(
      config,
      new LocalPlatform({ baseDir }),
      new AuditLogger(new MemoryAuditStore())
    )
  })

  afterEach(async () => {
    await executor.shutdown()
    await rm(baseDir, { recursive: true, force: true })
  })

  it('keeps variables and imports between calls', async () => {
    await executor.executeCode('alice', 'x = 20 + 22')
    const result = await executor.executeCode('alice', 'print(json.dumps({"x": x}))')

    expect(result).toMatchObject({ kind: 'success', success: true, stdout: '{"x": 42}\n' })
  })

  it('reports exceptions with their traceback', async () => {
    const result = await executor.executeCode('alice', 'raise ValueError("bad input")')

    expect(result.kind).toBe('success')
    if (result.kind !== 'success') return
    expect(result.success).toBe(false)
    expect(result.stderr.trim().split('\n').pop()).toBe('ValueError: bad input')
  })

  it('recovers from a timeout without losing state', async () => {
    await executor.executeCode('alice', 'import time\nx = 1')

    const slow = await executor.executeCode('alice', 'time.sleep(1)', 200)
    const next = await executor.executeCode('alice', 'print(x)')

    expect(slow).toMatchObject({ kind: 'timeout', error: 'Timeout after 200ms' })
    expect(next).toMatchObject({ kind: 'success', stdout: '1\n' })
  })

  it('runs shell commands beside the session', async () => {
    await executor.executeCode('alice', "open('note.txt', 'w').write('from python')")

    const result = await executor.executeShell('alice', 'cat note.txt')

    expect(result).toMatchObject({ kind: 'success', stdout: 'from python', exitCode: 0 })
  })
})
