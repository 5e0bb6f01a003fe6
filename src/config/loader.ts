import { AppConfigSchema, type AppConfig } from './schema.js'
import { getDefaults } from './defaults.js'
import { relayPaths } from './paths.js'
import { parseEnvConfig, parseCLIConfig, type CLIArgs } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge, type ConfigObject } from './merge.js'
import { ConfigError } from './errors.js'

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults
 * 2. User config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. CLI arguments
 */
export async function loadConfig(
  cliArgs: CLIArgs = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  let config: ConfigObject = getDefaults()

  const configPath = cliArgs.config ?? relayPaths().config
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
  }

  const localPath = cliArgs.config
    ? cliArgs.config.replace(/\.json$/, '.local.json')
    : relayPaths().localConfig
  if (await fileExists(localPath)) {
    config = deepMerge(config, await loadConfigFile(localPath))
  }

  config = deepMerge(config, parseEnvConfig(env))
  config = deepMerge(config, parseCLIConfig(cliArgs))

  const result = AppConfigSchema.safeParse(config)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.join('.')
    throw new ConfigError(`Invalid configuration at '${field}': ${issue?.message}`, field)
  }
  return result.data
}
