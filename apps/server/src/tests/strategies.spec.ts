import { describe, it, expect } from 'vitest'
import { SquinkSplashEngine } from '../engine/squinkSplashEngine.js'
import type { CellEntry, Coord } from '../engine/types.js'
import {
  BaseStrategy,
  CornerStrategy,
  RandomStrategy,
  createStrategy,
  isStrategyKind,
  observe,
} from '../strategies/index.js'
import type { ObservableState, PlayerStrategy } from '../strategies/index.js'

function boardState(width: number, height: number, position: Coord, cells: Record<string, string> = {}): ObservableState {
  const grid: (CellEntry | null)[][] = []
  for (let y = 0; y < height; y++) {
    const row: (CellEntry | null)[] = []
    for (let x = 0; x < width; x++) {
      const owner = cells[`${x},${y}`]
      row.push(owner ? { owner, claimedAt: 0 } : null)
    }
    grid.push(row)
  }
  return {
    phase: 'active',
    round: 0,
    roundsRemaining: 10,
    dimensions: { width, height },
    grid,
    self: { id: 'me', position: { ...position }, score: 0 },
    opponents: [],
  }
}

// Applies each decision as the engine would for a lone player and returns the targets chosen
function play(strategy: PlayerStrategy, state: ObservableState, turns: number): Coord[] {
  const targets: Coord[] = []
  for (let i = 0; i < turns; i++) {
    const decision = strategy.decide(state)
    if (!decision.ok) throw new Error(`no move on turn ${i}`)
    const { target } = decision.move
    targets.push(target)
    state.grid[target.y][target.x] = { owner: state.self.id, claimedAt: i }
    state.self.position = { ...target }
  }
  return targets
}

describe('strategy registry', () => {
  it('creates each known strategy', () => {
    expect(createStrategy('base').kind).toBe('base')
    expect(createStrategy('random').kind).toBe('random')
    expect(createStrategy('corner', { name: 'sweeper' }).name).toBe('sweeper')
  })

  it('recognises strategy names', () => {
    expect(isStrategyKind('corner')).toBe(true)
    expect(isStrategyKind('greedy')).toBe(false)
  })
})

describe('observe', () => {
  it('splits the snapshot into self and opponents', () => {
    const engine = new SquinkSplashEngine({ dimensions: { width: 3, height: 3 }, buyIn: 0, formingRounds: 0, rounds: 5 })
    engine.registerPlayer({ id: 'p1', payment: 0 })
    engine.registerPlayer({ id: 'p2', payment: 0 })
    engine.startGame()

    const view = observe(engine.queryState(), 'p2')

    expect(view?.self).toEqual({ id: 'p2', position: { x: 1, y: 0 }, score: 0 })
    expect(view?.opponents).toEqual([{ id: 'p1', position: { x: 0, y: 0 }, score: 0 }])
    expect(view?.roundsRemaining).toBe(5)
  })

  it('returns null for a player that is not in the game', () => {
    const engine = new SquinkSplashEngine({ dimensions: { width: 2, height: 2 }, buyIn: 0, formingRounds: 0, rounds: 1 })

    expect(observe(engine.queryState(), 'ghost')).toBeNull()
  })
})

describe('BaseStrategy', () => {
  it('steps to the first neighbour in left, up, right, down order', () => {
    const strategy = new BaseStrategy()

    expect(strategy.decide(boardState(3, 3, { x: 1, y: 1 }))).toEqual({ ok: true, move: { target: { x: 0, y: 1 } } })
    expect(strategy.decide(boardState(3, 3, { x: 0, y: 0 }))).toEqual({ ok: true, move: { target: { x: 1, y: 0 } } })
  })

  it('skips neighbours it already owns', () => {
    const decision = new BaseStrategy().decide(boardState(3, 3, { x: 1, y: 1 }, { '0,1': 'me' }))

    expect(decision).toEqual({ ok: true, move: { target: { x: 1, y: 0 } } })
  })

  it('repaints the first neighbour when it owns them all', () => {
    const decision = new BaseStrategy().decide(boardState(2, 1, { x: 0, y: 0 }, { '0,0': 'me', '1,0': 'me' }))

    expect(decision).toEqual({ ok: true, move: { target: { x: 1, y: 0 } } })
  })

  it('has no move on a 1x1 board', () => {
    expect(new BaseStrategy().decide(boardState(1, 1, { x: 0, y: 0 }))).toEqual({
      ok: false,
      reason: 'no_legal_move',
    })
  })
})

describe('RandomStrategy', () => {
  it('picks among in-bounds neighbours using the injected source', () => {
    const state = boardState(3, 3, { x: 1, y: 1 })

    expect(new RandomStrategy({ random: () => 0 }).decide(state)).toEqual({ ok: true, move: { target: { x: 0, y: 1 } } })
    expect(new RandomStrategy({ random: () => 0.5 }).decide(state)).toEqual({ ok: true, move: { target: { x: 2, y: 1 } } })
    expect(new RandomStrategy({ random: () => 0.99 }).decide(state)).toEqual({ ok: true, move: { target: { x: 1, y: 2 } } })
  })

  it('takes the only neighbour on a 1x2 board', () => {
    const strategy = new RandomStrategy({ random: () => 0.7 })

    expect(strategy.decide(boardState(1, 2, { x: 0, y: 0 }))).toEqual({ ok: true, move: { target: { x: 0, y: 1 } } })
    expect(strategy.decide(boardState(1, 2, { x: 0, y: 1 }))).toEqual({ ok: true, move: { target: { x: 0, y: 0 } } })
  })

  it('has no move on a 1x1 board', () => {
    expect(new RandomStrategy().decide(boardState(1, 1, { x: 0, y: 0 }))).toEqual({
      ok: false,
      reason: 'no_legal_move',
    })
  })
})

describe('CornerStrategy', () => {
  it('sweeps a 3x3 board from the bottom-right corner', () => {
    const targets = play(new CornerStrategy(), boardState(3, 3, { x: 2, y: 2 }), 13)

    expect(targets).toEqual([
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 2, y: 1 },
      { x: 1, y: 1 },
      { x: 0, y: 1 },
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 0, y: 2 },
      { x: 0, y: 1 },
    ])
  })

  it('walks to the corner first when starting top-left', () => {
    const targets = play(new CornerStrategy(), boardState(3, 3, { x: 0, y: 0 }), 10)

    expect(targets).toEqual([
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
      { x: 2, y: 2 },
      { x: 1, y: 2 },
      { x: 0, y: 2 },
      { x: 0, y: 1 },
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
    ])
  })

  it('steals a neighbouring opponent cell once nothing is left unclaimed', () => {
    const state = boardState(2, 1, { x: 0, y: 0 }, { '0,0': 'me', '1,0': 'rival' })

    expect(new CornerStrategy().decide(state)).toEqual({ ok: true, move: { target: { x: 1, y: 0 } } })
  })

  it('never targets the cell it stands on', () => {
    const strategy = new CornerStrategy()

    expect(strategy.decide(boardState(2, 1, { x: 1, y: 0 }))).toEqual({ ok: true, move: { target: { x: 0, y: 0 } } })
    expect(strategy.decide(boardState(2, 1, { x: 0, y: 0 }, { '0,0': 'me', '1,0': 'me' }))).toEqual({
      ok: true,
      move: { target: { x: 1, y: 0 } },
    })
  })

  it('has no move on a 1x1 board', () => {
    expect(new CornerStrategy().decide(boardState(1, 1, { x: 0, y: 0 }))).toEqual({
      ok: false,
      reason: 'no_legal_move',
    })
  })

  it('always returns the same move for the same board', () => {
    const strategy = new CornerStrategy()
    const state = boardState(4, 4, { x: 1, y: 2 }, { '3,3': 'rival', '0,0': 'me' })

    expect(strategy.decide(state)).toEqual(strategy.decide(state))
  })

  it('agrees with the engine that a 1x1 board has no legal move', () => {
    const engine = new SquinkSplashEngine({ dimensions: { width: 1, height: 1 }, buyIn: 0, formingRounds: 0, rounds: 1 })
    engine.registerPlayer({ id: 'p1', payment: 0 })
    engine.startGame()
    const view = observe(engine.queryState(), 'p1')
    if (!view) throw new Error('p1 missing')

    for (const strategy of [new BaseStrategy(), new RandomStrategy(), new CornerStrategy()]) {
      expect(strategy.decide(view)).toEqual({ ok: false, reason: 'no_legal_move' })
    }
    expect(engine.submitTurn('p1', { target: { x: 0, y: 0 } })).toMatchObject({ success: false, reason: 'illegal_move' })
  })

  it('never proposes an illegal move during a full game', () => {
    const engine = new SquinkSplashEngine({ dimensions: { width: 4, height: 3 }, buyIn: 0, formingRounds: 0, rounds: 15 })
    engine.registerPlayer({ id: 'p1', payment: 0 })
    engine.registerPlayer({ id: 'p2', payment: 0 })
    engine.startGame()
    const strategies = { p1: new CornerStrategy(), p2: new CornerStrategy() }

    while (engine.getPhase() === 'active') {
      for (const id of ['p1', 'p2'] as const) {
        const view = observe(engine.queryState(), id)
        if (!view || engine.getPhase() !== 'active') break
        const decision = strategies[id].decide(view)
        expect(decision.ok).toBe(true)
        if (decision.ok) expect(engine.submitTurn(id, decision.move).success).toBe(true)
      }
    }

    expect(engine.claimedCells()).toBe(12)
  })
})
