import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, stat } from 'fs/promises'
import os from 'os'
import path from 'path'
import { LocalPlatform, buildCleanEnv } from '../../src/platform/local.js'
import type { EnvironmentHandle, EnvironmentSpec } from '../../src/platform/types.js'
import { CommandRunner } from '../../src/sandbox/command.js'
import { ProvisioningError } from '../../src/sandbox/errors.js'
import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'

const SPEC: EnvironmentSpec = {
  image: 'unused',
  packages: [],
  cpu: 1,
  memoryMiB: 256,
  lifetimeMs: 60000,
  volumes: [],
}

describe('LocalPlatform', () => {
  let baseDir: string
  let platform: LocalPlatform
  let environment: EnvironmentHandle | undefined
  const runner = new CommandRunner(new AuditLogger(new MemoryAuditStore()), {
    shell: 'sh',
    maxOutputSize: 1024,
  })

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'relay-local-'))
    platform = new LocalPlatform({ baseDir, env: { GREETING: 'hello' } })
  })

  afterEach(async () => {
    await environment?.terminate()
    environment = undefined
    await rm(baseDir, { recursive: true, force: true })
  })

  it('runs commands in a scratch working directory', async () => {
    environment = await platform.provision(SPEC)

    const result = await runner.run(environment, 'pwd', 5000, 'local')

    expect(result.kind).toBe('success')
    expect(result.kind === 'success' && path.dirname(result.stdout.trim())).toBe(baseDir)
  })

  it('captures both streams and the exit code', async () => {
    environment = await platform.provision(SPEC)

    const result = await runner.run(environment, 'echo out; echo err >&2; exit 3', 5000, 'local')

    expect(result).toMatchObject({
      kind: 'success',
      success: false,
      stdout: 'out\n',
      stderr: 'err\n',
      exitCode: 3,
    })
  })

  it('passes only explicit variables to the process', async () => {
    environment = await platform.provision(SPEC)

    const result = await runner.run(environment, 'echo "$GREETING:$RELAY_HOME"', 5000, 'local')

    expect(result).toMatchObject({ kind: 'success', stdout: 'hello:\n' })
  })

  it('removes the working directory on terminate', async () => {
    environment = await platform.provision(SPEC)
    const result = await runner.run(environment, 'pwd', 5000, 'local')
    const workDir = result.kind === 'success' ? result.stdout.trim() : ''

    await environment.terminate()
    environment = undefined

    await expect(stat(workDir)).rejects.toThrow()
  })

  it('rejects spawning a missing binary', async () => {
    environment = await platform.provision(SPEC)

    await expect(environment.spawnProcess(['relay-no-such-binary'])).rejects.toThrow(
      ProvisioningError
    )
  })

  it('refuses to open volumes', async () => {
    await expect(platform.openVolume('tools')).rejects.toMatchObject({
      name: 'ProvisioningError',
      optional: true,
    })
  })

  it('refuses specs that mount volumes', async () => {
    await expect(
      platform.provision({ ...SPEC, volumes: [{ mountPath: '/mnt/servers', volume: { name: 'tools' } }] })
    ).rejects.toThrow('The local platform does not support volumes')
  })
})

describe('buildCleanEnv', () => {
  it('starts from a fixed minimal set', () => {
    const env = buildCleanEnv()

    expect(Object.keys(env).sort()).toEqual(['HOME', 'LANG', 'PATH', 'TERM'])
    expect(env.TERM).toBe('dumb')
  })

  it('adds explicit variables', () => {
    expect(buildCleanEnv({ TOKEN: 'test-secret' }).TOKEN).toBe('test-secret')
  })
})
