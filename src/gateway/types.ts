/**
 * Gateway types
 */

import type { SandboxExecutor } from '../sandbox/executor.js'
import type { AuditLogger } from '../audit/service.js'
import type { PlatformProvider } from '../platform/types.js'

/**
 * Gateway configuration
 */
export interface GatewayConfig {
  /** Host to bind (default: 127.0.0.1) */
  host: string
  /** Port to bind (default: 3000) */
  port: number
}

/**
 * Shared context for route handlers
 */
export interface GatewayContext {
  executor: SandboxExecutor
  auditLogger: AuditLogger
  provider: PlatformProvider
  config: GatewayConfig
  version: string
}
