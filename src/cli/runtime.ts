import type { AppConfig } from '../config/schema.js'
import { relayPaths } from '../config/paths.js'
import { validateConfig } from '../config/validation.js'
import { ConfigError } from '../config/errors.js'
import { AuditLogger, createAuditLogger } from '../audit/index.js'
import { createPlatform } from '../platform/index.js'
import type { SandboxPlatform } from '../platform/types.js'
import { SandboxExecutor } from '../sandbox/executor.js'

export interface Runtime {
  config: AppConfig
  auditLogger: AuditLogger
  platform: SandboxPlatform
  executor: SandboxExecutor
}

export interface RuntimeOptions {
  auditDir?: string
  /** Overrides the platform named by config. */
  platform?: SandboxPlatform
  warn?: (message: string) => void
}

/**
 * Validate config and wire the audit logger, platform and executor.
 */
export async function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const validation = validateConfig(config)
  const warn = options.warn ?? ((message: string) => console.warn(message))

  for (const warning of validation.warnings) {
    warn(`Warning: ${warning.path}: ${warning.message}`)
  }
  if (!validation.valid) {
    const [first] = validation.errors
    const hint = first.suggestion ? ` (${first.suggestion})` : ''
    throw new ConfigError(`${first.path}: ${first.message}${hint}`, first.path)
  }

  const auditLogger = createAuditLogger(config.logging, options.auditDir ?? relayPaths().auditDir)
  const platform = options.platform ?? createPlatform(config.platform)
  const executor = SandboxExecutor.fromConfig(config, platform, auditLogger)

  await auditLogger.info('config', 'runtime_started', {
    provider: platform.provider,
    volumeEnabled: config.platform.volume.enabled,
    defaultTimeoutMs: config.execution.defaultTimeoutMs,
  })

  return { config, auditLogger, platform, executor }
}
