import { mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { randomUUID } from 'crypto'
import type {
  EnvironmentHandle,
  EnvironmentSpec,
  ProcessHandle,
  SandboxPlatform,
  SpawnOptions,
  VolumeHandle,
} from './types.js'
import { spawnChild } from './child.js'
import { ProvisioningError } from '../sandbox/errors.js'

export interface LocalPlatformOptions {
  /** Parent directory for environment working directories. */
  baseDir?: string
  /** Extra variables added to the clean environment. */
  env?: Record<string, string>
}

/**
 * Environments as plain host processes in a scratch directory.
 *
 * No isolation beyond a clean environment and working directory; meant
 * for development. Volumes are not supported.
 */
export class LocalPlatform implements SandboxPlatform {
  readonly provider = 'local' as const

  constructor(private readonly options: LocalPlatformOptions = {}) {}

  async openVolume(name: string): Promise<VolumeHandle> {
    throw new ProvisioningError(
      `Volume '${name}' unavailable: the local platform does not support volumes`,
      true
    )
  }

  async provision(spec: EnvironmentSpec): Promise<EnvironmentHandle> {
    if (spec.volumes.length > 0) {
      throw new ProvisioningError('The local platform does not support volumes')
    }

    const baseDir = this.options.baseDir ?? os.tmpdir()
    let workDir: string
    try {
      workDir = await mkdtemp(path.join(baseDir, 'sandbox-relay-'))
    } catch (error) {
      throw new ProvisioningError(`Failed to create working directory in ${baseDir}`, false, {
        cause: error,
      })
    }

    return new LocalEnvironment(workDir, buildCleanEnv(this.options.env))
  }
}

class LocalEnvironment implements EnvironmentHandle {
  readonly id = `local-${randomUUID()}`
  private readonly processes = new Set<ProcessHandle>()

  constructor(
    readonly workDir: string,
    private readonly env: Record<string, string>
  ) {}

  async spawnProcess(argv: string[], options: SpawnOptions = {}): Promise<ProcessHandle> {
    const [command, ...args] = argv
    if (command === undefined) {
      throw new ProvisioningError('Cannot spawn an empty command')
    }

    const handle = await spawnChild(command, args, {
      cwd: this.workDir,
      env: this.env,
      timeoutMs: options.timeoutMs,
    })

    this.processes.add(handle)
    void handle.wait().then(() => this.processes.delete(handle))
    return handle
  }

  async terminate(): Promise<void> {
    for (const handle of this.processes) {
      await handle.kill?.()
    }
    this.processes.clear()
    await rm(this.workDir, { recursive: true, force: true })
  }
}

/**
 * Minimal environment: only explicit variables reach the process.
 */
export function buildCleanEnv(explicitEnv?: Record<string, string>): Record<string, string> {
  const cleanEnv: Record<string, string> = {
    PATH: '/usr/local/bin:/usr/bin:/bin',
    HOME: process.env.HOME || '/tmp',
    LANG: 'en_US.UTF-8',
    TERM: 'dumb',
  }

  if (explicitEnv) {
    Object.assign(cleanEnv, explicitEnv)
  }

  return cleanEnv
}
