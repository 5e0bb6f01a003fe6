import { execFile } from 'child_process'
import { promisify } from 'util'
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

const execFileAsync = promisify(execFile)

export type DockerNetworkMode = 'none' | 'bridge' | 'host'

export interface DockerPlatformOptions {
  networkMode: DockerNetworkMode
  pidsLimit: number
}

export const DEFAULT_DOCKER_OPTIONS: DockerPlatformOptions = {
  networkMode: 'none',
  pidsLimit: 64,
}

export class DockerVolume implements VolumeHandle {
  constructor(readonly name: string) {}
}

/**
 * Environments as long-lived Docker containers.
 *
 * The container idles on `sleep` for the environment lifetime; processes
 * run in it through `docker exec -i`. `packages` are not installed at
 * provision time: the image must already carry them.
 *
 * Hardening:
 * - Network isolation (--network=none by default)
 * - Capability dropping (--cap-drop=ALL)
 * - No privilege escalation
 * - Resource limits (memory, CPU, PIDs)
 */
export class DockerPlatform implements SandboxPlatform {
  readonly provider = 'docker' as const

  constructor(private readonly options: DockerPlatformOptions = DEFAULT_DOCKER_OPTIONS) {}

  async openVolume(name: string): Promise<VolumeHandle> {
    try {
      await execFileAsync('docker', ['volume', 'create', name])
      return new DockerVolume(name)
    } catch (error) {
      throw new ProvisioningError(`Failed to open docker volume '${name}'`, true, { cause: error })
    }
  }

  async provision(spec: EnvironmentSpec): Promise<EnvironmentHandle> {
    const name = `sandbox-relay-${randomUUID()}`
    const args = buildRunArgs(name, spec, this.options)

    try {
      const { stdout } = await execFileAsync('docker', args)
      return new DockerEnvironment(stdout.trim() || name)
    } catch (error) {
      throw new ProvisioningError(`Failed to start container from ${spec.image}`, false, {
        cause: error,
      })
    }
  }
}

class DockerEnvironment implements EnvironmentHandle {
  constructor(readonly id: string) {}

  async spawnProcess(argv: string[], options: SpawnOptions = {}): Promise<ProcessHandle> {
    const pidFile = `/tmp/sandbox-relay-${randomUUID()}.pid`
    const handle = await spawnChild('docker', buildExecArgs(this.id, argv, pidFile, options.timeoutMs), {
      timeoutMs: options.timeoutMs,
    })

    let exited = false
    void handle.wait().then(() => {
      exited = true
    })

    return {
      ...handle,
      // Killing the local docker client leaves the process running in the container
      kill: async () => {
        if (exited) return
        try {
          await execFileAsync('docker', buildKillArgs(this.id, pidFile))
        } finally {
          await handle.kill?.()
        }
      },
    }
  }

  async terminate(): Promise<void> {
    await execFileAsync('docker', ['rm', '-f', this.id])
  }
}

/**
 * Build `docker run` arguments for an idle environment container.
 */
export function buildRunArgs(
  name: string,
  spec: EnvironmentSpec,
  options: DockerPlatformOptions
): string[] {
  const args: string[] = [
    'run',
    '-d',
    '--rm',
    `--name=${name}`,

    `--network=${options.networkMode}`,

    '--cap-drop=ALL',
    '--security-opt=no-new-privileges',

    `--memory=${spec.memoryMiB}m`,
    `--cpus=${spec.cpu}`,
    `--pids-limit=${options.pidsLimit}`,
  ]

  for (const mount of spec.volumes) {
    if (!(mount.volume instanceof DockerVolume)) {
      throw new ProvisioningError(`Volume '${mount.volume.name}' was not opened by the docker platform`)
    }
    args.push('-v', `${mount.volume.name}:${mount.mountPath}:ro`)
  }

  args.push(spec.image)
  args.push('sleep', String(Math.ceil(spec.lifetimeMs / 1000)))

  return args
}

/**
 * Build `docker exec` arguments that record the process's pid in
 * `pidFile` inside the container.
 *
 * With a timeout the command runs under `timeout -s KILL`, so the
 * container enforces the deadline on its own; GNU timeout leads a process
 * group, and the file then names that group.
 */
export function buildExecArgs(
  containerId: string,
  argv: string[],
  pidFile: string,
  timeoutMs?: number
): string[] {
  const limit =
    timeoutMs === undefined ? [] : ['timeout', '-s', 'KILL', String(Math.ceil(timeoutMs / 1000))]
  const target = limit.length > 0 ? '-$$' : '$$'

  return [
    'exec',
    '-i',
    containerId,
    'sh',
    '-c',
    `echo ${target} > "$0" && exec "$@"`,
    pidFile,
    ...limit,
    ...argv,
  ]
}

/**
 * Build `docker exec` arguments that SIGKILL whatever `pidFile` names.
 */
export function buildKillArgs(containerId: string, pidFile: string): string[] {
  return ['exec', containerId, 'sh', '-c', 'kill -s KILL -- $(cat "$0")', pidFile]
}
