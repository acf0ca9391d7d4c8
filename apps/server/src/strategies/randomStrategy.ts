import { legalTargets, moveTo } from './helpers.js'
import type { ObservableState, PlayerStrategy, StrategyDecision, StrategyKind } from './types.js'

export interface RandomStrategyOptions {
  name?: string
  // Returns a float in [0, 1)
  random?: () => number
}

/** Steps to a uniformly chosen in-bounds neighbour. */
export class RandomStrategy implements PlayerStrategy {
  readonly kind: StrategyKind = 'random'
  readonly name: string
  private readonly random: () => number

  constructor(options: RandomStrategyOptions = {}) {
    this.name = options.name ?? 'random'
    this.random = options.random ?? Math.random
  }

  decide(state: ObservableState): StrategyDecision {
    const candidates = legalTargets(state)
    if (candidates.length === 0) {
      return { ok: false, reason: 'no_legal_move' }
    }

    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length))
    return moveTo(candidates[index].target)
  }
}
