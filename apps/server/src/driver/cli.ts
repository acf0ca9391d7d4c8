import { DriverEnvSchema } from '../config.js'
import type { DriverEnv } from '../config.js'

export interface DriverCliOptions {
  serverUrl: string
  gameId: string
  playerId: string
  strategy: DriverEnv['STRATEGY']
  pollIntervalMs: number
}

const FLAGS = {
  '--server-url': 'SERVER_URL',
  '--game': 'GAME_ID',
  '--player': 'PLAYER_ID',
  '--strategy': 'STRATEGY',
  '--poll-interval': 'POLL_INTERVAL_MS',
} as const

type Flag = keyof typeof FLAGS

function isFlag(value: string): value is Flag {
  return Object.prototype.hasOwnProperty.call(FLAGS, value)
}

export const USAGE = [
  'Usage: drive --game <id> --player <id> [options]',
  '',
  'Options:',
  '  --server-url <url>      Socket.IO namespace URL (SERVER_URL)',
  '  --game <id>             Game to play (GAME_ID)',
  '  --player <id>           Registered player to drive (PLAYER_ID)',
  '  --strategy <kind>       base | random | corner (STRATEGY)',
  '  --poll-interval <ms>    Delay between state polls (POLL_INTERVAL_MS)',
].join('\n')

/**
 * Reads driver settings from the environment, with command-line flags taking
 * precedence. Returns the problems found instead of options when either source
 * is incomplete or malformed.
 */
export function parseDriverArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): { ok: true; options: DriverCliOptions } | { ok: false; errors: string[] } {
  const overrides: Record<string, string> = {}
  const errors: string[] = []

  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i]
    if (raw === undefined || !raw.startsWith('--')) continue

    const [flag = raw, valueMaybe] = raw.split('=', 2)
    const next = argv[i + 1]
    const value = valueMaybe ?? (next !== undefined && !next.startsWith('--') ? next : undefined)

    if (!isFlag(flag)) {
      errors.push(`Unknown option ${flag}`)
      continue
    }
    if (value === undefined) {
      errors.push(`Missing value for ${flag}`)
      continue
    }
    overrides[FLAGS[flag]] = value
    if (valueMaybe === undefined) i += 1
  }

  const parsed = DriverEnvSchema.safeParse({ ...env, ...overrides })
  if (!parsed.success) {
    errors.push(...parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
  } else {
    if (parsed.data.GAME_ID === undefined) errors.push('A game id is required (--game or GAME_ID)')
    if (parsed.data.PLAYER_ID === undefined) errors.push('A player id is required (--player or PLAYER_ID)')
  }

  if (!parsed.success || errors.length > 0 || !parsed.data.GAME_ID || !parsed.data.PLAYER_ID) {
    return { ok: false, errors }
  }

  return {
    ok: true,
    options: {
      serverUrl: parsed.data.SERVER_URL,
      gameId: parsed.data.GAME_ID,
      playerId: parsed.data.PLAYER_ID,
      strategy: parsed.data.STRATEGY,
      pollIntervalMs: parsed.data.POLL_INTERVAL_MS,
    },
  }
}
