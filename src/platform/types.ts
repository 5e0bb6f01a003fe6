import type { ReadableSource, WritableSink } from '../stream/types.js'

/**
 * Platform backing the environments.
 */
export type PlatformProvider = 'modal' | 'docker' | 'local'

/**
 * A named storage volume opened on the platform.
 */
export interface VolumeHandle {
  readonly name: string
}

export interface VolumeMount {
  mountPath: string
  volume: VolumeHandle
}

/**
 * What an environment is provisioned with.
 */
export interface EnvironmentSpec {
  /** Base image (registry tag). */
  image: string
  /** Packages installed into the image on top of the base. */
  packages: string[]
  cpu: number
  memoryMiB: number
  /** Lifetime after which the platform reclaims the environment. */
  lifetimeMs: number
  volumes: VolumeMount[]
}

/**
 * One process spawned inside an environment.
 *
 * Streams come in whatever shape the platform provides; the stream
 * adapter normalizes them.
 */
export interface ProcessHandle {
  stdin: WritableSink
  stdout: ReadableSource
  stderr: ReadableSource
  /** Resolves with the exit code once the process has exited. */
  wait(): Promise<number>
  /** Force-stop, where the platform supports it. */
  kill?(): Promise<void>
}

export interface SpawnOptions {
  timeoutMs?: number
}

/**
 * An isolated execution context.
 */
export interface EnvironmentHandle {
  readonly id: string
  spawnProcess(argv: string[], options?: SpawnOptions): Promise<ProcessHandle>
  terminate(): Promise<void>
}

export interface SandboxPlatform {
  readonly provider: PlatformProvider
  /** Open (creating if missing) a named volume. May fail. */
  openVolume(name: string): Promise<VolumeHandle>
  provision(spec: EnvironmentSpec): Promise<EnvironmentHandle>
}
