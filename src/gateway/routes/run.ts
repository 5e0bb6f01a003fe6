/**
 * One-shot execution routes: a throwaway environment per request.
 */

import type { FastifyInstance } from 'fastify'
import type { GatewayContext } from '../types.js'
import { CodeRequestSchema, ShellRequestSchema } from './sessions.js'

export function registerRunRoutes(app: FastifyInstance, context: GatewayContext): void {
  const { executor } = context

  app.post('/run/code', async (request, reply) => {
    const body = CodeRequestSchema.safeParse(request.body)
    if (!body.success) {
      return reply.status(400).send({ error: 'Invalid request body' })
    }

    return reply.send(await executor.runCode(body.data.code, body.data.timeoutMs))
  })

  app.post('/run/shell', async (request, reply) => {
    const body = ShellRequestSchema.safeParse(request.body)
    if (!body.success) {
      return reply.status(400).send({ error: 'Invalid request body' })
    }

    return reply.send(await executor.runShell(body.data.command, body.data.timeoutMs))
  })
}
