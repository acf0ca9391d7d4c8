import type { Rejection, RejectionReason } from '../engine/errors.js'
import type { GamePhase, GameSnapshot, PlayerId, PlayerView, TurnRecord } from '../engine/types.js'
import type { SubmitOutcome } from '../driver/transport.js'

// Dates travel as ISO strings
export type WireTurnRecord = Omit<TurnRecord, 'timestamp'> & { timestamp: string }

export type Ack<T> = (response: T) => void

export type Failure = Rejection<RejectionReason>

export type WatchAck = { success: true; state: GameSnapshot } | Failure
export type StateAck = { success: true; state: GameSnapshot } | Failure
export type RegisterAck = { success: true; player: PlayerView } | Failure
export type StartAck = { success: true; roundsRemaining: number } | Failure
export type TickAck =
  | { success: true; phase: GamePhase; formingRoundsRemaining: number; roundsRemaining: number; roundCompleted: boolean }
  | Failure
export type TurnAck = SubmitOutcome

// Payloads are validated on arrival, so the server sees them as unknown
export interface ClientToServerEvents {
  ping: () => void
  watchGame: (payload: unknown, ack: Ack<WatchAck>) => void
  queryState: (payload: unknown, ack: Ack<StateAck>) => void
  registerPlayer: (payload: unknown, ack: Ack<RegisterAck>) => void
  startGame: (payload: unknown, ack: Ack<StartAck>) => void
  submitTurn: (payload: unknown, ack: Ack<TurnAck>) => void
  tick: (payload: unknown, ack: Ack<TickAck>) => void
}

export interface ServerToClientEvents {
  welcome: (message: string) => void
  pong: () => void
  playerRegistered: (data: { gameId: string; player: PlayerView }) => void
  gameStarted: (data: { gameId: string; starter: PlayerId | null; roundsRemaining: number }) => void
  turnTaken: (data: { gameId: string; turn: WireTurnRecord; player: PlayerView }) => void
  roundCompleted: (data: { gameId: string; round: number; roundsRemaining: number }) => void
  gameFinished: (data: { gameId: string; winners: PlayerId[]; standings: PlayerView[] }) => void
}
