import 'dotenv/config'
import { z } from 'zod'
import { MAX_DIMENSION } from './engine/grid.js'

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production')

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

export const ServerEnvSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  TURN_ORDER: z.enum(['any', 'sequential']).default('any'),
  DEFAULT_WIDTH: z.coerce.number().int().min(1).max(MAX_DIMENSION).default(16),
  DEFAULT_HEIGHT: z.coerce.number().int().min(1).max(MAX_DIMENSION).default(16),
  DEFAULT_BUY_IN: z.coerce.number().nonnegative().default(10),
  DEFAULT_FORMING_ROUNDS: intFromEnv(3),
  DEFAULT_ROUNDS: z.coerce.number().int().positive().default(20),
  TICK_INTERVAL_MS: intFromEnv(0),
})

export type ServerEnv = z.infer<typeof ServerEnvSchema>

export interface ServerConfig {
  env: ServerEnv['NODE_ENV']
  port: number
  host: string
  logLevel: NonNullable<ServerEnv['LOG_LEVEL']>
  turnOrder: ServerEnv['TURN_ORDER']
  tickIntervalMs: number
  defaults: {
    dimensions: { width: number; height: number }
    buyIn: number
    formingRounds: number
    rounds: number
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(source)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment: ${issues}`)
  }
  const env = parsed.data

  return {
    env: env.NODE_ENV,
    port: env.PORT ?? (env.NODE_ENV === 'development' ? 8890 : 9001),
    host: env.HOST,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'info' : 'warn'),
    turnOrder: env.TURN_ORDER,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    defaults: {
      dimensions: { width: env.DEFAULT_WIDTH, height: env.DEFAULT_HEIGHT },
      buyIn: env.DEFAULT_BUY_IN,
      formingRounds: env.DEFAULT_FORMING_ROUNDS,
      rounds: env.DEFAULT_ROUNDS,
    },
  }
}

export const DriverEnvSchema = z.object({
  SERVER_URL: z.string().url().default('http://localhost:9001/game'),
  GAME_ID: z.string().min(1).optional(),
  PLAYER_ID: z.string().min(1).optional(),
  STRATEGY: z.enum(['base', 'random', 'corner']).default('corner'),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),
})

export type DriverEnv = z.infer<typeof DriverEnvSchema>
