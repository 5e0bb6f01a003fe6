import type { AppConfig } from './schema.js'

export interface ValidationError {
  path: string
  message: string
  suggestion?: string
}

export interface ValidationWarning {
  path: string
  message: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
  warnings: ValidationWarning[]
}

/**
 * Validate a configuration for semantic correctness.
 * This goes beyond Zod schema validation to check combinations of settings.
 */
export function validateConfig(config: AppConfig): ValidationResult {
  const errors: ValidationError[] = []
  const warnings: ValidationWarning[] = []

  if (config.execution.terminateGraceMs > config.execution.defaultTimeoutMs) {
    warnings.push({
      path: 'execution.terminateGraceMs',
      message: 'Grace period for shutdown is longer than the default call timeout',
    })
  }

  if (config.platform.lifetimeMs <= config.execution.defaultTimeoutMs) {
    errors.push({
      path: 'platform.lifetimeMs',
      message: 'Environment lifetime does not outlast a single call',
      suggestion: `Set platform.lifetimeMs above ${config.execution.defaultTimeoutMs}`,
    })
  }

  if (config.platform.provider === 'local') {
    warnings.push({
      path: 'platform.provider',
      message: 'Local platform runs code directly on this host. Use modal or docker in production.',
    })

    if (config.platform.volume.enabled) {
      warnings.push({
        path: 'platform.volume.enabled',
        message: 'Local platform does not support volumes; sessions start without tool modules.',
      })
    }
  }

  if (config.platform.provider === 'docker' && config.platform.docker.networkMode === 'host') {
    warnings.push({
      path: 'platform.docker.networkMode',
      message: 'Host networking gives sandboxed code access to local services.',
    })
  }

  if (config.server.host === '0.0.0.0') {
    warnings.push({
      path: 'server.host',
      message: 'Binding to all interfaces exposes code execution. Ensure firewall is configured.',
    })
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
