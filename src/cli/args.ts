/**
 * Simple argument parser for the sandbox-relay CLI
 */

import type { CLIArgs } from '../config/env.js'
import { ConfigError } from '../config/errors.js'

export interface ParsedArgs {
  command?: string
  args: string[]
  flags: Record<string, boolean | string>
}

// Flags that never take a value
const BOOLEAN_FLAGS = new Set(['help', 'version'])

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, boolean | string> = {}
  const positional: string[] = []

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (arg === '--') {
      // Everything after a bare -- is positional
      positional.push(...argv.slice(i + 1))
      break
    } else if (arg.startsWith('--')) {
      const body = arg.slice(2)
      const eq = body.indexOf('=')
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1)
      } else if (BOOLEAN_FLAGS.has(body)) {
        flags[body] = true
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
        flags[body] = argv[i + 1]
        i++
      } else {
        flags[body] = true
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      const key = arg.slice(1)
      if (key === 'h') flags.help = true
      else if (key === 'v') flags.version = true
      else flags[key] = true
    } else {
      positional.push(arg)
    }
    i++
  }

  return {
    command: positional[0],
    args: positional.slice(1),
    flags,
  }
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
const PROVIDERS = ['modal', 'docker', 'local'] as const

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value)
}

function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(`--${name} requires a value`, name)
  }
  return value
}

/**
 * Parse a positive integer flag such as --port or --timeout.
 */
export function integerFlag(
  flags: ParsedArgs['flags'],
  name: string,
  min = 1
): number | undefined {
  const value = stringFlag(flags, name)
  if (value === undefined) return undefined
  if (!/^\d+$/.test(value) || parseInt(value, 10) < min) {
    throw new ConfigError(`--${name} must be an integer >= ${min}`, name, value)
  }
  return parseInt(value, 10)
}

/**
 * Map CLI flags onto the config overrides they stand for.
 */
export function toCLIArgs(flags: ParsedArgs['flags']): CLIArgs {
  const args: CLIArgs = {}

  const config = stringFlag(flags, 'config')
  if (config !== undefined) args.config = config

  const port = integerFlag(flags, 'port', 0)
  if (port !== undefined) args.port = port

  const host = stringFlag(flags, 'host')
  if (host !== undefined) args.host = host

  const logLevel = stringFlag(flags, 'log-level')
  if (logLevel !== undefined) {
    if (!isOneOf(LOG_LEVELS, logLevel)) {
      throw new ConfigError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`, 'log-level', logLevel)
    }
    args.logLevel = logLevel
  }

  const provider = stringFlag(flags, 'provider')
  if (provider !== undefined) {
    if (!isOneOf(PROVIDERS, provider)) {
      throw new ConfigError(`--provider must be one of ${PROVIDERS.join(', ')}`, 'provider', provider)
    }
    args.provider = provider
  }

  return args
}
