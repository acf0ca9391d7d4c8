import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { GameError } from '../engine/errors.js'
import type { GameConfig } from '../engine/types.js'
import { GameService } from '../services/gameService.js'
import type { GameEvent } from '../services/gameService.js'

const config: GameConfig = {
  dimensions: { width: 3, height: 3 },
  buyIn: 5,
  formingRounds: 0,
  rounds: 2,
}

describe('GameService', () => {
  let service: GameService
  let gameId: string
  let events: GameEvent[]

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    service = new GameService()
    events = []
    service.subscribe(event => events.push(event))
    gameId = service.createGame(config).gameId
  })

  afterEach(() => {
    service.cleanupGame(gameId)
    vi.restoreAllMocks()
  })

  async function registerAndStart(players: string[] = ['p1', 'p2']) {
    for (const playerId of players) {
      const result = await service.registerPlayer({ gameId, playerId, payment: 5 })
      expect(result.success).toBe(true)
    }
    expect((await service.startGame(gameId)).success).toBe(true)
  }

  describe('Game Creation', () => {
    test('creates a forming game with a unique id', () => {
      const other = service.createGame(config)

      expect(gameId).toMatch(/^game_\d+_/)
      expect(other.gameId).not.toBe(gameId)
      expect(other.snapshot.phase).toBe('forming')
      expect(service.hasGame(gameId)).toBe(true)
      expect(events[0]).toMatchObject({ type: 'gameCreated', gameId })

      service.cleanupGame(other.gameId)
    })

    test('throws for an invalid configuration and stores nothing', () => {
      const before = service.listGames().length

      expect(() => service.createGame({ ...config, dimensions: { width: 0, height: 1 } })).toThrow(GameError)
      expect(service.listGames()).toHaveLength(before)
    })

    test('logs game.init as one JSON line', () => {
      const log = vi.mocked(console.log)
      const { gameId: created } = service.createGame(config)

      const line = log.mock.calls.map(call => String(call[0])).find(text => text.includes(created))
      expect(line).toBeDefined()
      expect(JSON.parse(line ?? '{}')).toMatchObject({ evt: 'game.init', gameId: created, width: 3, height: 3, maxPlayers: 9 })

      service.cleanupGame(created)
    })
  })

  describe('Unknown Games', () => {
    test('every mutation answers game_not_found', async () => {
      expect(await service.registerPlayer({ gameId: 'nope', playerId: 'p1', payment: 5 })).toMatchObject({
        reason: 'game_not_found',
      })
      expect(await service.startGame('nope')).toMatchObject({ reason: 'game_not_found' })
      expect(await service.tick('nope')).toMatchObject({ reason: 'game_not_found' })
      expect(
        await service.submitTurn({ gameId: 'nope', playerId: 'p1', move: { target: { x: 0, y: 0 } } })
      ).toMatchObject({ reason: 'game_not_found' })
      expect(service.queryState('nope')).toBeUndefined()
      expect(service.getStandings('nope')).toBeUndefined()
    })
  })

  describe('Turns', () => {
    test('applies a turn id only once', async () => {
      await registerAndStart()

      const first = await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } }, turnId: 't-1' })
      const again = await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } }, turnId: 't-1' })

      expect(first.success).toBe(true)
      expect(again).toMatchObject({ success: false, reason: 'duplicate_turn' })
      expect(service.getTurns(gameId)).toHaveLength(1)
    })

    test('a rejected turn id can be retried', async () => {
      await registerAndStart()

      const bad = await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 2, y: 2 } }, turnId: 't-2' })
      const good = await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } }, turnId: 't-2' })

      expect(bad).toMatchObject({ reason: 'illegal_move' })
      expect(good.success).toBe(true)
    })

    test('serialises concurrent submissions for the same player', async () => {
      await registerAndStart()

      const results = await Promise.all([
        service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } } }),
        service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 0 } } }),
        service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 1, y: 1 } } }),
      ])

      expect(results.filter(r => r.success)).toHaveLength(1)
      expect(results.filter(r => !r.success && r.reason === 'turn_already_submitted')).toHaveLength(2)
      expect(service.queryState(gameId)?.players[0].score).toBe(1)
    })

    test('emits turn, round and finish events in order', async () => {
      await registerAndStart()
      events.length = 0

      await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } } })
      await service.submitTurn({ gameId, playerId: 'p2', move: { target: { x: 1, y: 1 } } })
      await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 2 } } })
      await service.submitTurn({ gameId, playerId: 'p2', move: { target: { x: 1, y: 2 } } })

      expect(events.map(e => e.type)).toEqual([
        'turnTaken',
        'turnTaken',
        'roundCompleted',
        'turnTaken',
        'turnTaken',
        'roundCompleted',
        'gameFinished',
      ])
      expect(events[events.length - 1]).toMatchObject({ type: 'gameFinished', winners: ['p1', 'p2'] })
      expect(service.getFinishedGameCount()).toBe(1)
    })
  })

  describe('Ticks and Standings', () => {
    test('tick closes the round and can finish the game', async () => {
      await registerAndStart()

      expect(await service.tick(gameId)).toMatchObject({ success: true, roundCompleted: true, roundsRemaining: 1 })
      expect(await service.tick(gameId)).toMatchObject({ success: true, phase: 'finished', roundsRemaining: 0 })
      expect(await service.tick(gameId)).toMatchObject({ success: false, reason: 'game_finished' })
      expect(service.getStandings(gameId)).toMatchObject({ phase: 'finished', winners: ['p1', 'p2'] })
    })

    test('standings have no winners while the game runs', async () => {
      await registerAndStart()
      await service.submitTurn({ gameId, playerId: 'p2', move: { target: { x: 2, y: 0 } } })

      expect(service.getStandings(gameId)).toEqual({
        phase: 'active',
        standings: [
          { id: 'p2', name: 'p2', position: { x: 2, y: 0 }, score: 1, hasMoved: true },
          { id: 'p1', name: 'p1', position: { x: 0, y: 0 }, score: 0, hasMoved: false },
        ],
        winners: null,
      })
    })

    test('the clock ticks the game until it finishes', async () => {
      vi.useFakeTimers()
      try {
        await registerAndStart()
        expect(service.startClock(gameId, 1000)).toBe(true)
        expect(service.startClock(gameId, 1000)).toBe(false)

        await vi.advanceTimersByTimeAsync(2000)

        expect(service.queryState(gameId)?.phase).toBe('finished')
      } finally {
        vi.useRealTimers()
      }
    })
  })

  describe('Subscriptions', () => {
    test('unsubscribe stops delivery', async () => {
      const seen: GameEvent[] = []
      const unsubscribe = service.subscribe(event => seen.push(event))

      await service.registerPlayer({ gameId, playerId: 'p1', payment: 5 })
      unsubscribe()
      await service.registerPlayer({ gameId, playerId: 'p2', payment: 5 })

      expect(seen).toHaveLength(1)
      expect(seen[0]).toMatchObject({ type: 'playerRegistered', player: { id: 'p1' } })
    })

    test('a throwing listener does not fail an applied turn', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      await registerAndStart()
      service.subscribe(() => {
        throw new Error('listener down')
      })

      const result = await service.submitTurn({ gameId, playerId: 'p1', move: { target: { x: 0, y: 1 } } })

      expect(result.success).toBe(true)
      expect(service.getTurns(gameId)).toHaveLength(1)
      expect(events.map(e => e.type)).toContain('turnTaken')
      const logged = JSON.parse(String(errorSpy.mock.calls[0][0]))
      expect(logged).toMatchObject({ evt: 'game.listener.error', gameId, type: 'turnTaken', error: 'listener down' })
    })
  })
})
