import { describe, it, expect } from 'vitest'
import { validateConfig } from '../../src/config/validation.js'
import { AppConfigSchema } from '../../src/config/schema.js'

describe('validateConfig', () => {
  it('accepts the defaults without findings', () => {
    const result = validateConfig(AppConfigSchema.parse({}))

    expect(result).toEqual({ valid: true, errors: [], warnings: [] })
  })

  it('rejects an environment lifetime shorter than a call', () => {
    const config = AppConfigSchema.parse({
      platform: { lifetimeMs: 60000 },
      execution: { defaultTimeoutMs: 60000 },
    })

    const result = validateConfig(config)

    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([
      {
        path: 'platform.lifetimeMs',
        message: 'Environment lifetime does not outlast a single call',
        suggestion: 'Set platform.lifetimeMs above 60000',
      },
    ])
  })

  it('warns about the local provider and its missing volume support', () => {
    const result = validateConfig(AppConfigSchema.parse({ platform: { provider: 'local' } }))

    expect(result.valid).toBe(true)
    expect(result.warnings.map((w) => w.path)).toEqual([
      'platform.provider',
      'platform.volume.enabled',
    ])
  })

  it('warns about host networking for docker', () => {
    const config = AppConfigSchema.parse({
      platform: { provider: 'docker', docker: { networkMode: 'host' } },
    })

    expect(validateConfig(config).warnings.map((w) => w.path)).toEqual([
      'platform.docker.networkMode',
    ])
  })

  it('warns when the grace period exceeds the call timeout', () => {
    const config = AppConfigSchema.parse({
      execution: { defaultTimeoutMs: 1000, terminateGraceMs: 5000 },
    })

    expect(validateConfig(config).warnings.map((w) => w.path)).toEqual([
      'execution.terminateGraceMs',
    ])
  })

  it('warns when binding to all interfaces', () => {
    const config = AppConfigSchema.parse({ server: { host: '0.0.0.0' } })

    expect(validateConfig(config).warnings).toEqual([
      {
        path: 'server.host',
        message: 'Binding to all interfaces exposes code execution. Ensure firewall is configured.',
      },
    ])
  })
})
