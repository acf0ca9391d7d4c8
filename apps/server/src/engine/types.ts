import type { GameErrorReason, Rejection } from './errors.js'

export type PlayerId = string

export interface Coord {
  x: number // column, 0 = left
  y: number // row, 0 = top
}

export interface Dimensions {
  width: number
  height: number
}

export type Direction = 'left' | 'up' | 'right' | 'down'

export type GamePhase = 'forming' | 'active' | 'finished'

// 'any': each player moves once per round in any order
// 'sequential': players move once per round in registration order
export type TurnOrder = 'any' | 'sequential'

export interface CellEntry {
  owner: PlayerId
  claimedAt: number // round in which the cell was last painted
}

export interface GameConfig {
  dimensions: Dimensions
  buyIn: number
  formingRounds: number
  rounds: number
  maxPlayers?: number
  turnOrder?: TurnOrder
  opener?: PlayerId
}

export interface Player {
  id: PlayerId
  name: string
  position: Coord
  score: number
  hasMoved: boolean
  payment: number
  joinedAt: Date
}

export interface Move {
  target: Coord
}

export type TurnOutcome = 'painted' | 'repainted' | 'stolen'

export interface TurnRecord {
  round: number
  playerId: PlayerId
  target: Coord
  outcome: TurnOutcome
  previousOwner: PlayerId | null
  timestamp: Date
}

export interface PlayerView {
  id: PlayerId
  name: string
  position: Coord
  score: number
  hasMoved: boolean
}

export interface GameSnapshot {
  phase: GamePhase
  dimensions: Dimensions
  buyIn: number
  pot: number
  rounds: number
  roundsRemaining: number
  formingRoundsRemaining: number
  round: number
  turnOrder: TurnOrder
  grid: (CellEntry | null)[][] // [y][x]
  players: PlayerView[]
  winners: PlayerId[] | null // set once finished
}

export interface RegistrationRequest {
  id: PlayerId
  payment: number
  name?: string
}

export type RegistrationResult =
  | { success: true; player: PlayerView }
  | Rejection

export type StartResult =
  | { success: true; roundsRemaining: number }
  | Rejection

export type TickResult =
  | { success: true; phase: GamePhase; formingRoundsRemaining: number; roundsRemaining: number; roundCompleted: boolean }
  | Rejection

export type TurnResult =
  | {
      success: true
      turn: TurnRecord
      player: PlayerView
      roundCompleted: boolean
      phase: GamePhase
      roundsRemaining: number
    }
  | Rejection

export interface ValidationResult {
  valid: boolean
  reason?: GameErrorReason
}
