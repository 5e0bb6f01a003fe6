import { describe, it, expect } from 'vitest'
import { relayPaths, resolveRelayHome } from '../../src/config/paths.js'

describe('resolveRelayHome', () => {
  it('prefers RELAY_HOME over everything else', () => {
    const env = { RELAY_HOME: '/srv/relay', XDG_CONFIG_HOME: '/home/ops/.config' }
    expect(resolveRelayHome(env, 'linux', '/home/ops')).toBe('/srv/relay')
  })

  it('lives under XDG_CONFIG_HOME when set', () => {
    expect(resolveRelayHome({ XDG_CONFIG_HOME: '/home/ops/.config' }, 'darwin', '/home/ops')).toBe(
      '/home/ops/.config/sandbox-relay'
    )
  })

  it('uses a dot directory on linux', () => {
    expect(resolveRelayHome({}, 'linux', '/home/ops')).toBe('/home/ops/.sandbox-relay')
  })

  it('uses Application Support on macOS', () => {
    expect(resolveRelayHome({}, 'darwin', '/Users/ops')).toBe(
      '/Users/ops/Library/Application Support/sandbox-relay'
    )
  })

  it('falls back to the user home on windows without APPDATA', () => {
    expect(resolveRelayHome({}, 'win32', '/users/ops')).toBe('/users/ops/sandbox-relay')
  })
})

describe('relayPaths', () => {
  it('lays out config and audit files under the home directory', () => {
    expect(relayPaths('/srv/relay')).toEqual({
      home: '/srv/relay',
      config: '/srv/relay/config.json',
      localConfig: '/srv/relay/config.local.json',
      auditDir: '/srv/relay/logs/audit',
    })
  })
})
