/**
 * Relay configuration.
 *
 * Everything is loaded from environment variables.
 * Required: DATABASE_URL, FIREBASE_PROJECT_ID, FIREBASE_AUTH, INTERNAL_API_KEY,
 * AUTH_JWT_SECRET.
 */

import { z } from 'zod'

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(6130),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.string().optional(),
  APP_VERSION: z.string().min(1).default('dev'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DATABASE_URL: z.string().min(1),

  FIREBASE_PROJECT_ID: z.string().min(1),
  /** Service account JSON, as downloaded from the Firebase console. */
  FIREBASE_AUTH: z.string().min(1),

  INTERNAL_API_KEY: z.string().min(1),
  AUTH_JWT_SECRET: z.string().min(1),
  ADMIN_GROUP: z.string().min(1).default('notifications_admin'),

  FANOUT_CONCURRENCY: z.coerce.number().int().min(1).max(500).default(50),
})

export interface RelayConfig {
  port: number
  host: string
  env: 'production' | 'development'
  version: string
  logLevel: string

  databaseUrl: string

  firebaseProjectId: string
  firebaseAuth: string

  internalApiKey: string
  jwtSecret: string
  adminGroup: string

  fanoutConcurrency: number
}

export class ConfigError extends Error {
  readonly keys: string[]

  constructor(keys: string[]) {
    super(`Invalid or missing environment variables: ${keys.join(', ')}`)
    this.name = 'ConfigError'
    this.keys = keys
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))]
    throw new ConfigError(keys)
  }
  const vars = parsed.data

  return {
    port: vars.PORT,
    host: vars.HOST,
    env: vars.NODE_ENV === 'production' ? 'production' : 'development',
    version: vars.APP_VERSION,
    logLevel: vars.LOG_LEVEL,

    databaseUrl: vars.DATABASE_URL,

    firebaseProjectId: vars.FIREBASE_PROJECT_ID,
    firebaseAuth: vars.FIREBASE_AUTH,

    internalApiKey: vars.INTERNAL_API_KEY,
    jwtSecret: vars.AUTH_JWT_SECRET,
    adminGroup: vars.ADMIN_GROUP,

    fanoutConcurrency: vars.FANOUT_CONCURRENCY,
  }
}
