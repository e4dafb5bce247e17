import { z } from 'zod'
import type { StorageConfig } from './core/types.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_DIR: z.string().min(1).optional(),
  DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).default(10),
  MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(500),
  STORAGE_BACKEND: z.enum(['memory']).default('memory')
}).refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
  message: 'DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE',
  path: ['DEFAULT_PAGE_SIZE']
})

export type LogLevel = typeof LOG_LEVELS[number]

export interface PaginationConfig {
  defaultPageSize: number
  maxPageSize: number
}

export interface AppConfig {
  host: string
  port: number
  logLevel: LogLevel
  logDir?: string
  pagination: PaginationConfig
  storage: StorageConfig
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parse = envSchema.safeParse(env)
  if (!parse.success) {
    const problems = parse.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }
  const data = parse.data

  return {
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL ?? (data.NODE_ENV === 'test' ? 'silent' : 'info'),
    ...(data.LOG_DIR ? { logDir: data.LOG_DIR } : {}),
    pagination: {
      defaultPageSize: data.DEFAULT_PAGE_SIZE,
      maxPageSize: data.MAX_PAGE_SIZE
    },
    storage: {
      type: data.STORAGE_BACKEND,
      maxPageSize: data.MAX_PAGE_SIZE
    }
  }
}
