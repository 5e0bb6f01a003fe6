import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { createRuntime } from '../../src/cli/runtime.js'
import { AppConfigSchema } from '../../src/config/schema.js'
import { ConfigError } from '../../src/config/errors.js'
import { FakePlatform } from '../helpers/fake-platform.js'

describe('createRuntime', () => {
  let dir: string | undefined

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('wires an executor over the given platform', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'relay-runtime-'))
    const platform = new FakePlatform()
    const config = AppConfigSchema.parse({ execution: { startTimeoutMs: 1000, terminateGraceMs: 50 } })

    const runtime = await createRuntime(config, { auditDir: dir, platform, warn: () => undefined })
    const result = await runtime.executor.executeShell('alice', 'echo ok')
    await runtime.executor.shutdown()

    expect(result).toMatchObject({ kind: 'success', stdout: 'ok\n' })
    const [started] = await runtime.auditLogger.query({ action: 'runtime_started' })
    expect(started.metadata).toEqual({
      provider: 'local',
      volumeEnabled: true,
      defaultTimeoutMs: 120000,
    })
  })

  it('reports validation warnings', async () => {
    const warnings: string[] = []
    const config = AppConfigSchema.parse({
      server: { host: '0.0.0.0' },
      logging: { audit: { enabled: false } },
    })

    await createRuntime(config, { platform: new FakePlatform(), warn: (m) => warnings.push(m) })

    expect(warnings).toEqual([
      'Warning: server.host: Binding to all interfaces exposes code execution. Ensure firewall is configured.',
    ])
  })

  it('refuses invalid configuration', async () => {
    const config = AppConfigSchema.parse({
      platform: { lifetimeMs: 1000 },
      logging: { audit: { enabled: false } },
    })

    const attempt = createRuntime(config, { platform: new FakePlatform(), warn: () => undefined })

    await expect(attempt).rejects.toThrow(ConfigError)
    await expect(
      createRuntime(config, { platform: new FakePlatform(), warn: () => undefined })
    ).rejects.toThrow('platform.lifetimeMs: Environment lifetime does not outlast a single call (Set platform.lifetimeMs above 120000)')
  })
})
