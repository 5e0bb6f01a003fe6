/**
 * Modal-backed environments.
 *
 * Authentication: the client reads MODAL_TOKEN_ID and MODAL_TOKEN_SECRET
 * from the environment (or the Modal config file).
 */

import { ModalClient, type App, type Sandbox } from 'modal'
import type {
  EnvironmentHandle,
  EnvironmentSpec,
  ProcessHandle,
  SandboxPlatform,
  SpawnOptions,
  VolumeHandle,
} from './types.js'
import type { Chunk } from '../stream/types.js'
import { ProvisioningError } from '../sandbox/errors.js'

type ModalVolumeRef = Awaited<ReturnType<ModalClient['volumes']['fromName']>>

export class ModalVolume implements VolumeHandle {
  constructor(
    readonly name: string,
    readonly ref: ModalVolumeRef
  ) {}
}

export interface ModalPlatformOptions {
  appName: string
  client?: ModalClient
}

export class ModalPlatform implements SandboxPlatform {
  readonly provider = 'modal' as const
  private readonly client: ModalClient
  private app: Promise<App> | null = null

  constructor(private readonly options: ModalPlatformOptions) {
    this.client = options.client ?? new ModalClient()
  }

  async openVolume(name: string): Promise<VolumeHandle> {
    try {
      const ref = await this.client.volumes.fromName(name, { createIfMissing: true })
      return new ModalVolume(name, ref)
    } catch (error) {
      throw new ProvisioningError(`Failed to open Modal volume '${name}'`, true, { cause: error })
    }
  }

  async provision(spec: EnvironmentSpec): Promise<EnvironmentHandle> {
    const volumes: Record<string, ModalVolumeRef> = {}
    for (const mount of spec.volumes) {
      if (!(mount.volume instanceof ModalVolume)) {
        throw new ProvisioningError(`Volume '${mount.volume.name}' was not opened by the Modal platform`)
      }
      volumes[mount.mountPath] = mount.volume.ref
    }

    try {
      const app = await this.getApp()

      let image = this.client.images.fromRegistry(spec.image)
      if (spec.packages.length > 0) {
        image = image.dockerfileCommands([
          `RUN pip install --no-cache-dir ${spec.packages.join(' ')}`,
        ])
      }

      const sandbox = await this.client.sandboxes.create(app, image, {
        cpu: spec.cpu,
        memoryMiB: spec.memoryMiB,
        timeoutMs: spec.lifetimeMs,
        volumes,
      })

      return new ModalEnvironment(sandbox)
    } catch (error) {
      throw new ProvisioningError(`Failed to create Modal sandbox from ${spec.image}`, false, {
        cause: error,
      })
    }
  }

  private getApp(): Promise<App> {
    if (!this.app) {
      this.app = this.client.apps
        .fromName(this.options.appName, { createIfMissing: true })
        .catch((error: unknown) => {
          this.app = null
          throw error
        })
    }
    return this.app
  }
}

class ModalEnvironment implements EnvironmentHandle {
  constructor(private readonly sandbox: Sandbox) {}

  get id(): string {
    return this.sandbox.sandboxId
  }

  async spawnProcess(argv: string[], options: SpawnOptions = {}): Promise<ProcessHandle> {
    const proc = await this.exec(argv, options)

    return {
      stdin: proc.stdin,
      stdout: readerChunks(proc.stdout),
      stderr: readerChunks(proc.stderr),
      wait: () => proc.wait(),
    }
  }

  async terminate(): Promise<void> {
    await this.sandbox.terminate()
  }

  private async exec(argv: string[], options: SpawnOptions) {
    try {
      return await this.sandbox.exec(argv, { timeoutMs: options.timeoutMs })
    } catch (error) {
      throw new ProvisioningError(`Failed to exec ${argv[0] ?? ''} in sandbox ${this.id}`, false, {
        cause: error,
      })
    }
  }
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Chunk }>
  releaseLock(): void
}

/**
 * Web stream -> async iterable of chunks.
 */
async function* readerChunks(stream: { getReader(): ChunkReader }): AsyncGenerator<Chunk> {
  const reader = stream.getReader()
  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) return
      if (value !== undefined) yield value
    }
  } finally {
    reader.releaseLock()
  }
}
