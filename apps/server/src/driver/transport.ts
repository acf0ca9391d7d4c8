import type { RejectionReason, Rejection } from '../engine/errors.js'
import type { GamePhase, GameSnapshot, Move, PlayerId, TurnResult } from '../engine/types.js'

export interface SubmitTurnRequest {
  gameId: string
  playerId: PlayerId
  move: Move
  turnId: string
}

export type SubmitOutcome =
  | { success: true; round: number; roundCompleted: boolean; phase: GamePhase; score: number }
  | Rejection<RejectionReason>

/**
 * How a driver reaches the game.
 *
 * Rule violations come back as rejections. Anything that kept the request
 * from reaching the game (or its answer from coming back) throws a
 * TransportError and may be retried.
 */
export interface GameTransport {
  // null when the game does not exist
  queryState(gameId: string): Promise<GameSnapshot | null>
  submitTurn(request: SubmitTurnRequest): Promise<SubmitOutcome>
  close(): Promise<void>
}

export class TransportError extends Error {
  readonly transient = true

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

// Narrows a service turn result to what crosses the wire
export function toSubmitOutcome(result: TurnResult | Rejection<RejectionReason>): SubmitOutcome {
  if (!result.success) return result
  return {
    success: true,
    round: result.turn.round,
    roundCompleted: result.roundCompleted,
    phase: result.phase,
    score: result.player.score,
  }
}
