/**
 * Gateway HTTP server
 */

import Fastify, { type FastifyInstance } from 'fastify'
import { randomUUID } from 'crypto'
import type { GatewayConfig, GatewayContext } from './types.js'
import { registerHealthRoutes } from './routes/health.js'
import { registerSessionRoutes } from './routes/sessions.js'
import { registerRunRoutes } from './routes/run.js'

export interface GatewayOptions {
  /** Fastify logger level; false disables request logging. */
  logLevel?: string | false
}

/**
 * Create and configure the gateway server.
 */
export async function createGateway(
  context: GatewayContext,
  options: GatewayOptions = {}
): Promise<FastifyInstance> {
  const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST
  const logLevel = options.logLevel ?? (isTest ? false : 'info')

  const app = Fastify({
    logger: logLevel === false ? false : { level: logLevel },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  })

  // Request correlation
  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id)
  })

  app.setErrorHandler(async (error, request, reply) => {
    request.log.error(error)

    const statusCode = error.statusCode ?? 500
    const message = statusCode >= 500 ? 'Internal server error' : error.message

    await context.auditLogger
      .log({
        category: 'gateway',
        action: 'error',
        severity: statusCode >= 500 ? 'alert' : 'warning',
        requestId: request.id,
        metadata: { errorMessage: message, statusCode, url: request.url },
      })
      .catch((auditError: unknown) => request.log.warn({ err: auditError }, 'audit write failed'))

    return reply.status(statusCode).send({
      error: message,
      requestId: request.id,
    })
  })

  registerHealthRoutes(app, context)
  registerSessionRoutes(app, context)
  registerRunRoutes(app, context)

  // Release every environment when the server stops
  app.addHook('onClose', async () => {
    await context.executor.shutdown()
  })

  return app
}

/**
 * Start the gateway server.
 */
export async function startGateway(
  config: GatewayConfig,
  context: GatewayContext,
  options: GatewayOptions = {}
): Promise<FastifyInstance> {
  const app = await createGateway(context, options)

  try {
    await app.listen({ host: config.host, port: config.port })
    console.log(`Gateway listening on http://${config.host}:${config.port}`)
    return app
  } catch (err) {
    app.log.error(err)
    throw err
  }
}
