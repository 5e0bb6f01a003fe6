import { describe, it, expect } from 'vitest'
import { deepMerge, setPath, isConfigObject } from '../../src/config/merge.js'

describe('deepMerge', () => {
  it('overrides single settings inside a section', () => {
    const defaults = { execution: { defaultTimeoutMs: 30000, startTimeoutMs: 60000 } }
    const file = { execution: { defaultTimeoutMs: 5000 } }

    expect(deepMerge(defaults, file)).toEqual({
      execution: { defaultTimeoutMs: 5000, startTimeoutMs: 60000 },
    })
  })

  it('replaces lists instead of concatenating them', () => {
    const defaults = { platform: { packages: ['numpy'] } }
    const file = { platform: { packages: ['pandas', 'scipy'] } }

    expect(deepMerge(defaults, file)).toEqual({ platform: { packages: ['pandas', 'scipy'] } })
  })

  it('skips undefined values so unset CLI flags keep the file value', () => {
    const file = { server: { port: 8080, host: '0.0.0.0' } }
    const cli = { server: { port: undefined, host: '127.0.0.1' } }

    expect(deepMerge(file, cli)).toEqual({ server: { port: 8080, host: '127.0.0.1' } })
  })

  it('lets a scalar replace a whole section', () => {
    expect(deepMerge({ platform: { volume: { name: 'tools' } } }, { platform: null })).toEqual({
      platform: null,
    })
  })

  it('leaves both layers untouched', () => {
    const defaults = { logging: { level: 'info' } }
    const env = { logging: { level: 'debug' } }

    deepMerge(defaults, env)

    expect(defaults).toEqual({ logging: { level: 'info' } })
    expect(env).toEqual({ logging: { level: 'debug' } })
  })
})

describe('setPath', () => {
  it('builds the sections an environment key names', () => {
    const config: Record<string, unknown> = {}
    setPath(config, 'platform.volume.mountPath', '/mnt/tools')
    expect(config).toEqual({ platform: { volume: { mountPath: '/mnt/tools' } } })
  })

  it('adds to a section set by an earlier key', () => {
    const config: Record<string, unknown> = { server: { port: 8080 } }
    setPath(config, 'server.host', '0.0.0.0')
    expect(config).toEqual({ server: { port: 8080, host: '0.0.0.0' } })
  })

  it('ignores an empty path', () => {
    const config: Record<string, unknown> = {}
    setPath(config, '', 'value')
    expect(config).toEqual({})
  })
})

describe('isConfigObject', () => {
  it('accepts sections and rejects lists, null and scalars', () => {
    expect(isConfigObject({ port: 8080 })).toBe(true)
    expect(isConfigObject(['numpy'])).toBe(false)
    expect(isConfigObject(null)).toBe(false)
    expect(isConfigObject('docker')).toBe(false)
  })
})
