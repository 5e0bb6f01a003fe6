import path from 'path'
import os from 'os'

/** Files sandbox-relay reads and writes under its home directory. */
export interface RelayPaths {
  home: string
  config: string
  localConfig: string
  auditDir: string
}

/**
 * RELAY_HOME when set, otherwise `sandbox-relay` under XDG_CONFIG_HOME,
 * otherwise the per-user location for `platform`.
 */
export function resolveRelayHome(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  userHome: string = os.homedir()
): string {
  if (env.RELAY_HOME) return env.RELAY_HOME
  if (env.XDG_CONFIG_HOME) return path.join(env.XDG_CONFIG_HOME, 'sandbox-relay')

  if (platform === 'win32') return path.join(env.APPDATA ?? userHome, 'sandbox-relay')
  if (platform === 'darwin') {
    return path.join(userHome, 'Library', 'Application Support', 'sandbox-relay')
  }
  return path.join(userHome, '.sandbox-relay')
}

export function relayPaths(home: string = resolveRelayHome()): RelayPaths {
  return {
    home,
    config: path.join(home, 'config.json'),
    localConfig: path.join(home, 'config.local.json'),
    auditDir: path.join(home, 'logs', 'audit'),
  }
}
