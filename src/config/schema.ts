import { z } from 'zod'

export const DEFAULT_INIT_CODE = [
  'import numpy as np',
  'import pandas as pd',
  'import json',
  'import sys',
  "sys.path.insert(0, '/mnt/servers')",
  '',
].join('\n')

// Storage volume holding auxiliary tool modules
export const VolumeConfigSchema = z.object({
  enabled: z.boolean().default(true),
  name: z.string().min(1).default('sandbox-relay-tools'),
  mountPath: z.string().startsWith('/').default('/mnt/servers'),
})

// Sandbox platform configuration
export const PlatformConfigSchema = z.object({
  provider: z.enum(['modal', 'docker', 'local']).default('modal'),
  appName: z.string().min(1).default('sandbox-relay'),
  image: z.string().min(1).default('python:3.12-slim'),
  packages: z.array(z.string()).default(['numpy', 'pandas']),
  cpu: z.number().positive().default(1),
  memoryMiB: z.number().int().positive().default(2048),
  lifetimeMs: z.number().int().positive().default(600000), // 10 min
  volume: VolumeConfigSchema.default({}),
  docker: z
    .object({
      networkMode: z.enum(['none', 'bridge', 'host']).default('none'),
      pidsLimit: z.number().int().positive().default(64),
    })
    .default({}),
})

// Resident interpreter configuration
export const InterpreterConfigSchema = z.object({
  command: z.array(z.string()).min(1).default(['python3', '-u']),
  initCode: z.string().default(DEFAULT_INIT_CODE),
})

// Execution bounds
export const ExecutionConfigSchema = z.object({
  defaultTimeoutMs: z.number().int().positive().default(120000),
  startTimeoutMs: z.number().int().positive().default(120000),
  terminateGraceMs: z.number().int().positive().default(5000),
  shell: z.string().min(1).default('bash'),
  maxOutputSize: z.number().int().positive().default(1024 * 1024), // 1MB
  restartOnTimeout: z.boolean().default(false),
})

// Server configuration
export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(3000),
})

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  audit: z
    .object({
      enabled: z.boolean().default(true),
      maxEntries: z.number().int().positive().default(1000),
    })
    .default({}),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  platform: PlatformConfigSchema.default({}),
  interpreter: InterpreterConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>
export type VolumeConfig = z.infer<typeof VolumeConfigSchema>
export type InterpreterConfig = z.infer<typeof InterpreterConfigSchema>
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>
export type ServerConfig = z.infer<typeof ServerConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
