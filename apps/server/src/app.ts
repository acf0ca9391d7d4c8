import Fastify, { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import fastifySocketIO from 'fastify-socket.io'
import { Socket } from 'socket.io'
import { z } from 'zod'
import type { ServerConfig } from './config.js'
import { GameError, reject } from './engine/errors.js'
import type { GameConfig } from './engine/types.js'
import { toSubmitOutcome } from './driver/transport.js'
import { GameService } from './services/gameService.js'
import type { GameEvent } from './services/gameService.js'
import type {
  Ack,
  Failure,
  RegisterAck,
  ServerToClientEvents,
  StartAck,
  StateAck,
  TickAck,
  TurnAck,
  WatchAck,
} from './types/socket.js'
import { logEvent } from './utils/eventLog.js'
import {
  GameConfigSchema,
  QueryStatePayloadSchema,
  RegisterPlayerPayloadSchema,
  StartGamePayloadSchema,
  SubmitTurnPayloadSchema,
  TickPayloadSchema,
  WatchGamePayloadSchema,
} from './validation/schemas.js'

// Single namespace constant
export const NAMESPACE = '/game'

const CreateGameBodySchema = GameConfigSchema.partial()

interface GameParams {
  gameId: string
}

export interface BuildServerOptions {
  config: ServerConfig
  service?: GameService
  logger?: boolean
}

export interface GameServer {
  app: FastifyInstance
  service: GameService
}

// Validates an incoming payload; on failure answers the ack and returns null
function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  ack: Ack<Failure> | undefined
): T | null {
  // Clients that emit without a callback get nothing back
  if (typeof ack !== 'function') return null

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    ack(reject('invalid_payload', parsed.error.issues.map(issue => issue.message).join('; ')))
    return null
  }
  return parsed.data
}

export async function buildServer(options: BuildServerOptions): Promise<GameServer> {
  const { config } = options
  const service = options.service ?? new GameService()

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  })

  await fastify.register(cors, {
    origin: true, // Allow all origins for development
    methods: ['GET', 'POST'],
    credentials: true,
  })

  await fastify.register(fastifySocketIO, {
    cors: {
      origin: true,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  })

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      turnOrder: config.turnOrder,
      activeGames: service.getActiveGameCount(),
    }
  })

  fastify.post('/games', async (request, reply) => {
    const parsed = CreateGameBodySchema.safeParse(request.body ?? {})
    if (!parsed.success) {
      reply.code(400)
      return { error: 'invalid_payload', issues: parsed.error.issues.map(issue => issue.message) }
    }

    const gameConfig: GameConfig = {
      ...config.defaults,
      turnOrder: config.turnOrder,
      ...parsed.data,
    }

    try {
      const { gameId, snapshot } = service.createGame(gameConfig)
      if (config.tickIntervalMs > 0) {
        service.startClock(gameId, config.tickIntervalMs)
      }
      reply.code(201)
      return { gameId, state: snapshot }
    } catch (error) {
      if (error instanceof GameError) {
        reply.code(400)
        return { error: error.reason, message: error.message }
      }
      throw error
    }
  })

  fastify.get<{ Params: GameParams }>('/games/:gameId', async (request, reply) => {
    const { gameId } = request.params
    const state = service.queryState(gameId)
    if (!state) {
      reply.code(404)
      return { error: 'game_not_found' }
    }
    return state
  })

  fastify.get<{ Params: GameParams }>('/games/:gameId/standings', async (request, reply) => {
    const { gameId } = request.params
    const standings = service.getStandings(gameId)
    if (!standings) {
      reply.code(404)
      return { error: 'game_not_found' }
    }
    return standings
  })

  fastify.get<{ Params: GameParams }>('/games/:gameId/turns', async (request, reply) => {
    const { gameId } = request.params
    const turns = service.getTurns(gameId)
    if (!turns) {
      reply.code(404)
      return { error: 'game_not_found' }
    }
    return { gameId, turns }
  })

  fastify.post<{ Params: GameParams }>('/games/:gameId/tick', async (request, reply) => {
    const { gameId } = request.params
    const result = await service.tick(gameId)
    if (!result.success) {
      reply.code(result.reason === 'game_not_found' ? 404 : 409)
      return { error: result.reason, message: result.message }
    }
    return result
  })

  // Debug endpoints (dev only)
  if (config.env !== 'production') {
    fastify.get('/debug/games', async () => {
      return {
        games: service.listGames(),
        active: service.getActiveGameCount(),
        finished: service.getFinishedGameCount(),
      }
    })
  }

  const gameNamespace = fastify.io.of(NAMESPACE)

  const emitToGame = <E extends keyof ServerToClientEvents>(
    gameId: string,
    event: E,
    ...args: Parameters<ServerToClientEvents[E]>
  ) => {
    gameNamespace.to(gameId).emit(event, ...args)
  }

  const broadcast = (event: GameEvent) => {
    switch (event.type) {
      case 'playerRegistered':
        emitToGame(event.gameId, 'playerRegistered', { gameId: event.gameId, player: event.player })
        break
      case 'gameStarted':
        emitToGame(event.gameId, 'gameStarted', {
          gameId: event.gameId,
          starter: event.starter,
          roundsRemaining: event.roundsRemaining,
        })
        break
      case 'turnTaken':
        emitToGame(event.gameId, 'turnTaken', {
          gameId: event.gameId,
          turn: { ...event.turn, timestamp: event.turn.timestamp.toISOString() },
          player: event.player,
        })
        break
      case 'roundCompleted':
        emitToGame(event.gameId, 'roundCompleted', {
          gameId: event.gameId,
          round: event.round,
          roundsRemaining: event.roundsRemaining,
        })
        break
      case 'gameFinished':
        emitToGame(event.gameId, 'gameFinished', {
          gameId: event.gameId,
          winners: event.winners,
          standings: event.standings,
        })
        break
      case 'gameCreated':
        break
    }
  }
  const unsubscribe = service.subscribe(broadcast)
  fastify.addHook('onClose', async () => {
    unsubscribe()
  })

  gameNamespace.on('connection', (socket: Socket) => {
    logEvent('socket.connect', { socketId: socket.id })
    socket.emit('welcome', 'Connected to game server')

    socket.on('ping', () => {
      socket.emit('pong')
    })

    socket.on('watchGame', async (payload: unknown, ack: Ack<WatchAck>) => {
      const data = parsePayload(WatchGamePayloadSchema, payload, ack)
      if (!data) return

      const state = service.queryState(data.gameId)
      if (!state) {
        ack(reject('game_not_found'))
        return
      }
      await socket.join(data.gameId)
      logEvent('socket.watch', { socketId: socket.id, gameId: data.gameId })
      ack({ success: true, state })
    })

    socket.on('queryState', (payload: unknown, ack: Ack<StateAck>) => {
      const data = parsePayload(QueryStatePayloadSchema, payload, ack)
      if (!data) return

      const state = service.queryState(data.gameId)
      ack(state ? { success: true, state } : reject('game_not_found'))
    })

    socket.on('registerPlayer', async (payload: unknown, ack: Ack<RegisterAck>) => {
      const data = parsePayload(RegisterPlayerPayloadSchema, payload, ack)
      if (!data) return
      ack(await service.registerPlayer(data))
    })

    socket.on('startGame', async (payload: unknown, ack: Ack<StartAck>) => {
      const data = parsePayload(StartGamePayloadSchema, payload, ack)
      if (!data) return
      ack(await service.startGame(data.gameId, data.callerId))
    })

    socket.on('submitTurn', async (payload: unknown, ack: Ack<TurnAck>) => {
      const data = parsePayload(SubmitTurnPayloadSchema, payload, ack)
      if (!data) return

      logEvent('turn.received', { socketId: socket.id, gameId: data.gameId, playerId: data.playerId, turnId: data.turnId ?? null })
      ack(toSubmitOutcome(await service.submitTurn(data)))
    })

    socket.on('tick', async (payload: unknown, ack: Ack<TickAck>) => {
      const data = parsePayload(TickPayloadSchema, payload, ack)
      if (!data) return
      ack(await service.tick(data.gameId))
    })

    socket.on('disconnect', (reason: string) => {
      logEvent('socket.disconnect', { socketId: socket.id, reason })
    })
  })

  return { app: fastify, service }
}
