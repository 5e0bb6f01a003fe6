import { SandboxExecutor } from '../../src/sandbox/executor.js'
import { AuditLogger } from '../../src/audit/service.js'
import { MemoryAuditStore } from '../../src/audit/store/memory.js'
import { AppConfigSchema } from '../../src/config/schema.js'
import { createGateway } from '../../src/gateway/server.js'
import type { GatewayContext } from '../../src/gateway/types.js'
import { FakePlatform } from './fake-platform.js'

export const TEST_CONFIG = AppConfigSchema.parse({
  execution: {
    defaultTimeoutMs: 2000,
    startTimeoutMs: 1000,
    terminateGraceMs: 50,
  },
})

/**
 * A gateway backed by the fake platform with audit kept in memory.
 */
export async function createTestGateway() {
  const platform = new FakePlatform()
  const store = new MemoryAuditStore()
  const auditLogger = new AuditLogger(store)
  const executor = SandboxExecutor.fromConfig(TEST_CONFIG, platform, auditLogger)

  const context: GatewayContext = {
    executor,
    auditLogger,
    provider: platform.provider,
    config: { host: '127.0.0.1', port: 0 },
    version: '0.0.0-test',
  }

  const app = await createGateway(context, { logLevel: false })
  return { app, platform, store, executor }
}
