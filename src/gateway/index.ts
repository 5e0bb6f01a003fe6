/**
 * Gateway module - HTTP API
 */

export type { GatewayConfig, GatewayContext } from './types.js'

export { createGateway, startGateway, type GatewayOptions } from './server.js'
export { CallerParamsSchema, CodeRequestSchema, ShellRequestSchema } from './routes/sessions.js'
