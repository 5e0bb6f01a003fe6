/**
 * Health check routes
 */

import type { FastifyInstance } from 'fastify'
import type { GatewayContext } from '../types.js'

export function registerHealthRoutes(app: FastifyInstance, context: GatewayContext): void {
  // Basic health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    }
  })

  // Detailed health check
  app.get('/health/detailed', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: context.version,
      provider: context.provider,
      sessions: context.executor.listSessions().length,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    }
  })

  // Readiness check
  app.get('/ready', async () => {
    return { ready: true }
  })
}
