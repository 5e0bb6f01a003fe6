/**
 * Per-caller session routes
 */

import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type { GatewayContext } from '../types.js'
import { emit } from '../../sandbox/audit.js'

export const CallerParamsSchema = z.object({
  callerId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9._:-]+$/),
})

export const CodeRequestSchema = z.object({
  code: z.string(),
  timeoutMs: z.number().int().positive().optional(),
})

export const ShellRequestSchema = z.object({
  command: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
})

export function registerSessionRoutes(app: FastifyInstance, context: GatewayContext): void {
  const { executor, auditLogger } = context

  // List live sessions
  app.get('/sessions', async (_request, reply) => {
    return reply.send({ sessions: executor.listSessions() })
  })

  // Get session by caller ID
  app.get('/sessions/:callerId', async (request, reply) => {
    const params = CallerParamsSchema.safeParse(request.params)
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid caller id' })
    }

    const session = executor.getSession(params.data.callerId)
    if (!session) {
      return reply.status(404).send({ error: 'Session not found' })
    }

    return reply.send(session)
  })

  // Run a snippet in the caller's interpreter session
  app.post('/sessions/:callerId/code', async (request, reply) => {
    const params = CallerParamsSchema.safeParse(request.params)
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid caller id' })
    }
    const body = CodeRequestSchema.safeParse(request.body)
    if (!body.success) {
      return reply.status(400).send({ error: 'Invalid request body' })
    }

    const result = await executor.executeCode(
      params.data.callerId,
      body.data.code,
      body.data.timeoutMs
    )
    return reply.send(result)
  })

  // Run a one-shot command in the caller's environment
  app.post('/sessions/:callerId/shell', async (request, reply) => {
    const params = CallerParamsSchema.safeParse(request.params)
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid caller id' })
    }
    const body = ShellRequestSchema.safeParse(request.body)
    if (!body.success) {
      return reply.status(400).send({ error: 'Invalid request body' })
    }

    const result = await executor.executeShell(
      params.data.callerId,
      body.data.command,
      body.data.timeoutMs
    )
    return reply.send(result)
  })

  // Release session
  app.delete('/sessions/:callerId', async (request, reply) => {
    const params = CallerParamsSchema.safeParse(request.params)
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid caller id' })
    }

    await executor.releaseSession(params.data.callerId)

    await emit(auditLogger, {
      category: 'gateway',
      action: 'session_released',
      sessionId: params.data.callerId,
      requestId: request.id,
    })

    return reply.status(204).send()
  })
}
