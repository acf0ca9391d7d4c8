import { BaseStrategy } from './baseStrategy.js'
import { CornerStrategy } from './cornerStrategy.js'
import { RandomStrategy } from './randomStrategy.js'
import type { PlayerStrategy, StrategyKind } from './types.js'

export const STRATEGY_KINDS: readonly StrategyKind[] = ['base', 'random', 'corner']

export function isStrategyKind(value: string): value is StrategyKind {
  return STRATEGY_KINDS.some(kind => kind === value)
}

export interface StrategyOptions {
  name?: string
  random?: () => number
}

export function createStrategy(kind: StrategyKind, options: StrategyOptions = {}): PlayerStrategy {
  switch (kind) {
    case 'base':
      return new BaseStrategy(options.name)
    case 'random':
      return new RandomStrategy(options)
    case 'corner':
      return new CornerStrategy(options.name)
  }
}

export { BaseStrategy, CornerStrategy, RandomStrategy }
export { observe } from './types.js'
export type { ObservableState, PlayerStrategy, StrategyDecision, StrategyKind } from './types.js'
