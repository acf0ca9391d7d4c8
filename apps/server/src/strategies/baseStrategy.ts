import { legalTargets, moveTo, ownerAt } from './helpers.js'
import type { ObservableState, PlayerStrategy, StrategyDecision, StrategyKind } from './types.js'

/**
 * Template strategy.
 *
 * Steps to the first in-bounds neighbour (left, up, right, down) it does not
 * already own, or to the first neighbour at all once it owns them every one.
 * Extend this class and override `decide` to write a new player.
 */
export class BaseStrategy implements PlayerStrategy {
  readonly kind: StrategyKind = 'base'
  readonly name: string

  constructor(name = 'base') {
    this.name = name
  }

  decide(state: ObservableState): StrategyDecision {
    const neighbours = legalTargets(state)
    const unowned = neighbours.find(candidate => ownerAt(state, candidate.target)?.owner !== state.self.id)
    const choice = unowned ?? neighbours[0]
    if (!choice) return { ok: false, reason: 'no_legal_move' }
    return moveTo(choice.target)
  }
}
