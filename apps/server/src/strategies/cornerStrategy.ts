import { coordToIndex, manhattan, sameCoord } from '../engine/grid.js'
import type { Coord } from '../engine/types.js'
import { legalTargets, moveTo, ownerAt, stepToward } from './helpers.js'
import type { ObservableState, PlayerStrategy, StrategyDecision, StrategyKind } from './types.js'

type CellFilter = (state: ObservableState, coord: Coord) => boolean

const isUnclaimed: CellFilter = (state, coord) => ownerAt(state, coord) === null

const isOpponents: CellFilter = (state, coord) => {
  const entry = ownerAt(state, coord)
  return entry !== null && entry.owner !== state.self.id
}

function cells(state: ObservableState, filter: CellFilter): Coord[] {
  const found: Coord[] = []
  for (let y = 0; y < state.dimensions.height; y++) {
    for (let x = 0; x < state.dimensions.width; x++) {
      if (filter(state, { x, y })) found.push({ x, y })
    }
  }
  return found
}

// Nearest by Manhattan distance; row-major scan order makes the top-left-most win ties
function nearest(from: Coord, targets: Coord[]): Coord | undefined {
  let best: Coord | undefined
  let bestDistance = Infinity
  for (const target of targets) {
    const distance = manhattan(from, target)
    if (distance < bestDistance) {
      best = target
      bestDistance = distance
    }
  }
  return best
}

function elsewhere(position: Coord, targets: Coord[]): Coord[] {
  return targets.filter(target => !sameCoord(target, position))
}

function rowMajor(state: ObservableState, coord: Coord): number {
  return coordToIndex(coord, state.dimensions.width)
}

// Row-major index of the player's bottom-right-most cell, -1 when it owns none
function lastOwnedIndex(state: ObservableState): number {
  const owned = cells(state, (s, coord) => ownerAt(s, coord)?.owner === s.self.id)
  const last = owned[owned.length - 1]
  return last ? rowMajor(state, last) : -1
}

function bottomRightMost(targets: Coord[]): Coord | undefined {
  return targets[targets.length - 1]
}

/**
 * Deterministic sweeper.
 *
 * Opens at the bottom-right-most unclaimed cell, then works back toward the
 * top-left, always preferring unclaimed cells over painted ones. Neighbours
 * are tried left, up, right, down and every walk closes the horizontal gap
 * first, so the same board always yields the same move.
 */
export class CornerStrategy implements PlayerStrategy {
  readonly kind: StrategyKind = 'corner'
  readonly name: string

  constructor(name = 'corner') {
    this.name = name
  }

  decide(state: ObservableState): StrategyDecision {
    const { self } = state
    const unclaimed = cells(state, isUnclaimed)

    // Head for the bottom-right-most open cell until we hold something at or past it
    const anchor = bottomRightMost(unclaimed)
    if (anchor && !sameCoord(anchor, self.position) && rowMajor(state, anchor) > lastOwnedIndex(state)) {
      return moveTo(stepToward(self.position, anchor))
    }

    const neighbours = legalTargets(state)
    const open = neighbours.find(candidate => isUnclaimed(state, candidate.target))
    if (open) return moveTo(open.target)

    const nextOpen = nearest(self.position, elsewhere(self.position, unclaimed))
    if (nextOpen) return moveTo(stepToward(self.position, nextOpen))

    const steal = neighbours.find(candidate => isOpponents(state, candidate.target))
    if (steal) return moveTo(steal.target)

    const nextSteal = nearest(self.position, elsewhere(self.position, cells(state, isOpponents)))
    if (nextSteal) return moveTo(stepToward(self.position, nextSteal))

    // Nothing left to gain: repaint a neighbour, if there is one
    const [fallback] = neighbours
    if (!fallback) return { ok: false, reason: 'no_legal_move' }
    return moveTo(fallback.target)
  }
}
