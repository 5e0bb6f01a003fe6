import type { PlatformConfig } from '../config/schema.js'
import type { SandboxPlatform } from './types.js'
import { DockerPlatform } from './docker.js'
import { LocalPlatform } from './local.js'
import { ModalPlatform } from './modal.js'

export type {
  PlatformProvider,
  VolumeHandle,
  VolumeMount,
  EnvironmentSpec,
  ProcessHandle,
  SpawnOptions,
  EnvironmentHandle,
  SandboxPlatform,
} from './types.js'

export { ModalPlatform, ModalVolume, type ModalPlatformOptions } from './modal.js'
export {
  DockerPlatform,
  DockerVolume,
  buildRunArgs,
  buildExecArgs,
  buildKillArgs,
  DEFAULT_DOCKER_OPTIONS,
  type DockerPlatformOptions,
  type DockerNetworkMode,
} from './docker.js'
export { LocalPlatform, buildCleanEnv, type LocalPlatformOptions } from './local.js'
export { spawnChild, type ChildSpawnOptions } from './child.js'

/**
 * Build the platform named by `config.provider`.
 */
export function createPlatform(config: PlatformConfig): SandboxPlatform {
  switch (config.provider) {
    case 'modal':
      return new ModalPlatform({ appName: config.appName })
    case 'docker':
      return new DockerPlatform(config.docker)
    case 'local':
      return new LocalPlatform()
  }
}
