import { z } from 'zod'
import { MAX_DIMENSION } from '../engine/grid.js'

/**
 * Zod schemas for everything that arrives over HTTP or Socket.IO.
 *
 * They check shape only. Rule checks (adjacency, bounds, buy-in, phase)
 * stay in the engine so every caller gets the same answer.
 */

export const CoordSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
})

export const MoveSchema = z.object({
  target: CoordSchema,
})

export const GameConfigSchema = z.object({
  dimensions: z.object({
    width: z.number().int().min(1).max(MAX_DIMENSION),
    height: z.number().int().min(1).max(MAX_DIMENSION),
  }),
  buyIn: z.number().nonnegative(),
  formingRounds: z.number().int().nonnegative(),
  rounds: z.number().int().positive(),
  maxPlayers: z.number().int().positive().optional(),
  turnOrder: z.enum(['any', 'sequential']).optional(),
  opener: z.string().min(1).optional(),
})

const GameIdSchema = z.string().min(1)

export const WatchGamePayloadSchema = z.object({
  gameId: GameIdSchema,
})

export const QueryStatePayloadSchema = z.object({
  gameId: GameIdSchema,
})

export const TickPayloadSchema = z.object({
  gameId: GameIdSchema,
})

export const RegisterPlayerPayloadSchema = z.object({
  gameId: GameIdSchema,
  playerId: z.string().min(1),
  payment: z.number().nonnegative(),
  name: z.string().optional(),
})

export const StartGamePayloadSchema = z.object({
  gameId: GameIdSchema,
  callerId: z.string().min(1).optional(),
})

export const SubmitTurnPayloadSchema = z.object({
  gameId: GameIdSchema,
  playerId: z.string().min(1),
  move: MoveSchema,
  turnId: z.string().min(1).optional(),
})
