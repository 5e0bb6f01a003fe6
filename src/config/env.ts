import { setPath } from './merge.js'

const ENV_PREFIX = 'RELAY_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['RELAY_HOME'])

/**
 * Parse environment variables into a partial config object.
 *
 * Naming conventions:
 * - Double underscore separates path segments
 * - Single underscore separates words within a segment (camelCased)
 *
 *   RELAY_SERVER__PORT                  -> server.port
 *   RELAY_EXECUTION__DEFAULT_TIMEOUT_MS -> execution.defaultTimeoutMs
 *   RELAY_PLATFORM__VOLUME__NAME        -> platform.volume.name
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue

    if (RESERVED_ENV_VARS.has(key)) continue

    setPath(config, envKeyToPath(key), parseValue(value))
  }

  return config
}

/**
 * RELAY_EXECUTION__DEFAULT_TIMEOUT_MS -> execution.defaultTimeoutMs
 */
export function envKeyToPath(key: string): string {
  return key
    .slice(ENV_PREFIX.length)
    .split('__')
    .map((segment) =>
      segment
        .toLowerCase()
        .split('_')
        .filter((word) => word.length > 0)
        .map((word, i) => (i === 0 ? word : word[0].toUpperCase() + word.slice(1)))
        .join('')
    )
    .join('.')
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  // Boolean
  if (value === 'true') return true
  if (value === 'false') return false

  // Integer
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)

  // Float
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  // JSON (arrays/objects)
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Fall through to string
    }
  }

  // String
  return value
}

/**
 * Parse CLI arguments into a partial config object.
 */
export function parseCLIConfig(args: CLIArgs): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  if (args.port !== undefined) {
    setPath(config, 'server.port', args.port)
  }

  if (args.host !== undefined) {
    setPath(config, 'server.host', args.host)
  }

  if (args.logLevel !== undefined) {
    setPath(config, 'logging.level', args.logLevel)
  }

  if (args.provider !== undefined) {
    setPath(config, 'platform.provider', args.provider)
  }

  return config
}

export interface CLIArgs {
  config?: string
  port?: number
  host?: string
  logLevel?: 'debug' | 'info' | 'warn' | 'error'
  provider?: 'modal' | 'docker' | 'local'
}
