// Schema and types
export { AppConfigSchema, DEFAULT_INIT_CODE, type AppConfig } from './schema.js'
export type {
  PlatformConfig,
  VolumeConfig,
  InterpreterConfig,
  ExecutionConfig,
  ServerConfig,
  LoggingConfig,
} from './schema.js'

// Defaults
export { getDefaults } from './defaults.js'

// Paths
export { resolveRelayHome, relayPaths, type RelayPaths } from './paths.js'

// Environment parsing
export { parseEnvConfig, envKeyToPath, parseValue, parseCLIConfig, type CLIArgs } from './env.js'

// File utilities
export { fileExists, loadConfigFile, saveConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath, isConfigObject, type ConfigObject } from './merge.js'

// Loader
export { loadConfig } from './loader.js'

// Errors
export { ConfigError } from './errors.js'

// Validation
export {
  validateConfig,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js'
