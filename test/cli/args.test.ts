import { describe, it, expect } from 'vitest'
import { parseArgs, integerFlag, toCLIArgs } from '../../src/cli/args.js'
import { ConfigError } from '../../src/config/errors.js'

describe('parseArgs', () => {
  it('parses a command with positional args', () => {
    expect(parseArgs(['run-shell', 'echo', 'hi'])).toEqual({
      command: 'run-shell',
      args: ['echo', 'hi'],
      flags: {},
    })
  })

  it('parses flags with separate values', () => {
    const result = parseArgs(['serve', '--port', '8080', '--host', '0.0.0.0'])

    expect(result.command).toBe('serve')
    expect(result.flags).toEqual({ port: '8080', host: '0.0.0.0' })
  })

  it('parses --key=value flags', () => {
    expect(parseArgs(['serve', '--log-level=debug']).flags).toEqual({ 'log-level': 'debug' })
  })

  it('treats a flag followed by another flag as boolean', () => {
    expect(parseArgs(['serve', '--verbose', '--port', '1']).flags).toEqual({
      verbose: true,
      port: '1',
    })
  })

  it('never gives --help a value', () => {
    expect(parseArgs(['--help', 'serve'])).toEqual({
      command: 'serve',
      args: [],
      flags: { help: true },
    })
  })

  it('maps short flags', () => {
    expect(parseArgs(['-h', '-v']).flags).toEqual({ help: true, version: true })
  })

  it('treats everything after -- as positional', () => {
    expect(parseArgs(['run-shell', '--timeout', '5', '--', 'ls', '--all'])).toEqual({
      command: 'run-shell',
      args: ['ls', '--all'],
      flags: { timeout: '5' },
    })
  })

  it('keeps - as a positional argument', () => {
    expect(parseArgs(['run-code', '-']).args).toEqual(['-'])
  })
})

describe('integerFlag', () => {
  it('returns undefined when absent', () => {
    expect(integerFlag({}, 'timeout')).toBeUndefined()
  })

  it('parses integers', () => {
    expect(integerFlag({ timeout: '2500' }, 'timeout')).toBe(2500)
  })

  it('rejects values below the minimum', () => {
    expect(() => integerFlag({ timeout: '0' }, 'timeout')).toThrow('--timeout must be an integer >= 1')
  })

  it('rejects non-numeric values', () => {
    expect(() => integerFlag({ timeout: '5s' }, 'timeout')).toThrow(ConfigError)
  })

  it('rejects a flag without a value', () => {
    expect(() => integerFlag({ timeout: true }, 'timeout')).toThrow('--timeout requires a value')
  })
})

describe('toCLIArgs', () => {
  it('maps flags onto config overrides', () => {
    expect(
      toCLIArgs({
        config: '/etc/relay.json',
        port: '0',
        host: 'localhost',
        'log-level': 'warn',
        provider: 'docker',
      })
    ).toEqual({
      config: '/etc/relay.json',
      port: 0,
      host: 'localhost',
      logLevel: 'warn',
      provider: 'docker',
    })
  })

  it('ignores unrelated flags', () => {
    expect(toCLIArgs({ timeout: '5' })).toEqual({})
  })

  it('rejects unknown log levels', () => {
    expect(() => toCLIArgs({ 'log-level': 'trace' })).toThrow(
      '--log-level must be one of debug, info, warn, error'
    )
  })

  it('rejects unknown providers', () => {
    expect(() => toCLIArgs({ provider: 'lambda' })).toThrow(
      '--provider must be one of modal, docker, local'
    )
  })
})
