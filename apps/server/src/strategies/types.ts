import type { CellEntry, Coord, Dimensions, GamePhase, GameSnapshot, Move, PlayerId } from '../engine/types.js'

export type StrategyKind = 'base' | 'random' | 'corner'

export interface OpponentView {
  id: PlayerId
  position: Coord
  score: number
}

// What a player is allowed to see when deciding its move
export interface ObservableState {
  phase: GamePhase
  round: number
  roundsRemaining: number
  dimensions: Dimensions
  grid: (CellEntry | null)[][] // [y][x]
  self: {
    id: PlayerId
    position: Coord
    score: number
  }
  opponents: OpponentView[]
}

export type StrategyDecision =
  | { ok: true; move: Move }
  | { ok: false; reason: 'no_legal_move' }

export interface PlayerStrategy {
  readonly kind: StrategyKind
  readonly name: string
  decide(state: ObservableState): StrategyDecision
}

export function observe(snapshot: GameSnapshot, playerId: PlayerId): ObservableState | null {
  const self = snapshot.players.find(p => p.id === playerId)
  if (!self) return null

  return {
    phase: snapshot.phase,
    round: snapshot.round,
    roundsRemaining: snapshot.roundsRemaining,
    dimensions: { ...snapshot.dimensions },
    grid: snapshot.grid.map(row => row.map(cell => (cell ? { ...cell } : null))),
    self: { id: self.id, position: { ...self.position }, score: self.score },
    opponents: snapshot.players
      .filter(p => p.id !== playerId)
      .map(p => ({ id: p.id, position: { ...p.position }, score: p.score })),
  }
}
