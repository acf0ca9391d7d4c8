import { NEIGHBOUR_DIRECTIONS, isValidCoord, moveToward } from '../engine/grid.js'
import type { CellEntry, Coord, Direction, Move } from '../engine/types.js'
import type { ObservableState, StrategyDecision } from './types.js'

export interface Candidate {
  direction: Direction
  target: Coord
}

export function ownerAt(state: ObservableState, coord: Coord): CellEntry | null {
  return state.grid[coord.y]?.[coord.x] ?? null
}

/** In-bounds neighbours of the player's position, in left, up, right, down order. */
export function legalTargets(state: ObservableState): Candidate[] {
  const { width, height } = state.dimensions
  return NEIGHBOUR_DIRECTIONS
    .map(direction => ({ direction, target: moveToward(state.self.position, direction) }))
    .filter(candidate => isValidCoord(candidate.target, width, height))
}

export function moveTo(target: Coord): StrategyDecision {
  const move: Move = { target: { x: target.x, y: target.y } }
  return { ok: true, move }
}

// One step from `from` toward `to`, closing the horizontal gap before the vertical one
export function stepToward(from: Coord, to: Coord): Coord {
  if (to.x !== from.x) return { x: from.x + Math.sign(to.x - from.x), y: from.y }
  if (to.y !== from.y) return { x: from.x, y: from.y + Math.sign(to.y - from.y) }
  return { ...from }
}
