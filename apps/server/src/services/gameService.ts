import { Mutex } from 'async-mutex'
import { v4 as uuidv4 } from 'uuid'
import { reject } from '../engine/errors.js'
import type { Rejection } from '../engine/errors.js'
import { SquinkSplashEngine } from '../engine/squinkSplashEngine.js'
import type {
  GameConfig,
  GamePhase,
  GameSnapshot,
  Move,
  PlayerId,
  PlayerView,
  RegistrationResult,
  StartResult,
  TickResult,
  TurnRecord,
  TurnResult,
} from '../engine/types.js'
import { logError, logEvent } from '../utils/eventLog.js'

export type GameEvent =
  | { type: 'gameCreated'; gameId: string; snapshot: GameSnapshot }
  | { type: 'playerRegistered'; gameId: string; player: PlayerView }
  | { type: 'gameStarted'; gameId: string; starter: PlayerId | null; roundsRemaining: number }
  | { type: 'turnTaken'; gameId: string; turn: TurnRecord; player: PlayerView }
  | { type: 'roundCompleted'; gameId: string; round: number; roundsRemaining: number }
  | { type: 'gameFinished'; gameId: string; winners: PlayerId[]; standings: PlayerView[] }

export type GameEventListener = (event: GameEvent) => void

export type NotFound = Rejection<'game_not_found'>

export interface RegisterRequest {
  gameId: string
  playerId: PlayerId
  payment: number
  name?: string
}

export interface TurnRequest {
  gameId: string
  playerId: PlayerId
  move: Move
  turnId?: string
}

export interface GameSummary {
  gameId: string
  phase: GamePhase
  players: number
  round: number
  roundsRemaining: number
  createdAt: Date
  finishedAt?: Date
}

interface GameEntry {
  engine: SquinkSplashEngine
  mutex: Mutex
  appliedTurns: Set<string>
  createdAt: Date
  clock: NodeJS.Timeout | null
}

/**
 * Owns every running game.
 *
 * Mutations for one game run one at a time behind that game's mutex, so no
 * two turns are ever validated against the same state. Reads take a
 * snapshot without locking.
 */
export class GameService {
  private games = new Map<string, GameEntry>()
  private listeners = new Set<GameEventListener>()

  subscribe(listener: GameEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  createGame(config: GameConfig): { gameId: string; snapshot: GameSnapshot } {
    // Throws GameError for a bad configuration before anything is stored
    const engine = new SquinkSplashEngine(config)
    const gameId = `game_${Date.now()}_${uuidv4()}`

    this.games.set(gameId, {
      engine,
      mutex: new Mutex(),
      appliedTurns: new Set(),
      createdAt: new Date(),
      clock: null,
    })

    const snapshot = engine.queryState()
    const resolved = engine.getConfig()
    logEvent('game.init', {
      gameId,
      width: resolved.dimensions.width,
      height: resolved.dimensions.height,
      buyIn: resolved.buyIn,
      formingRounds: resolved.formingRounds,
      rounds: resolved.rounds,
      maxPlayers: resolved.maxPlayers,
      turnOrder: resolved.turnOrder,
    })
    this.emit({ type: 'gameCreated', gameId, snapshot })

    return { gameId, snapshot }
  }

  async registerPlayer(request: RegisterRequest): Promise<RegistrationResult | NotFound> {
    const { gameId, playerId, payment, name } = request
    const entry = this.games.get(gameId)
    if (!entry) return reject('game_not_found')

    return await entry.mutex.runExclusive(() => {
      const result = entry.engine.registerPlayer({ id: playerId, payment, name })

      if (!result.success) {
        logEvent('player.register', { gameId, playerId, reason: result.reason })
        return result
      }

      logEvent('player.register', { gameId, playerId, position: result.player.position, result: 'registered' })
      this.emit({ type: 'playerRegistered', gameId, player: result.player })
      return result
    })
  }

  async startGame(gameId: string, callerId?: PlayerId): Promise<StartResult | NotFound> {
    const entry = this.games.get(gameId)
    if (!entry) return reject('game_not_found')

    return await entry.mutex.runExclusive(() => {
      const result = entry.engine.startGame(callerId)

      if (!result.success) {
        logEvent('game.start', { gameId, callerId: callerId ?? null, reason: result.reason })
        return result
      }

      logEvent('game.start', {
        gameId,
        callerId: callerId ?? null,
        players: entry.engine.getPlayers().length,
        roundsRemaining: result.roundsRemaining,
      })
      this.emit({ type: 'gameStarted', gameId, starter: callerId ?? null, roundsRemaining: result.roundsRemaining })
      return result
    })
  }

  async submitTurn(request: TurnRequest): Promise<TurnResult | NotFound | Rejection<'duplicate_turn'>> {
    const { gameId, playerId, move, turnId } = request
    const entry = this.games.get(gameId)
    if (!entry) return reject('game_not_found')

    return await entry.mutex.runExclusive(() => {
      if (turnId !== undefined && entry.appliedTurns.has(turnId)) {
        logEvent('turn', { gameId, playerId, turnId, reason: 'duplicate_turn' })
        return reject('duplicate_turn')
      }

      const result = entry.engine.submitTurn(playerId, move)

      if (!result.success) {
        logEvent('turn', { gameId, playerId, turnId: turnId ?? null, target: move.target, reason: result.reason })
        return result
      }

      if (turnId !== undefined) entry.appliedTurns.add(turnId)

      logEvent('turn', {
        gameId,
        playerId,
        turnId: turnId ?? null,
        round: result.turn.round,
        target: result.turn.target,
        outcome: result.turn.outcome,
        score: result.player.score,
      })
      this.emit({ type: 'turnTaken', gameId, turn: result.turn, player: result.player })

      if (result.roundCompleted) {
        this.afterRound(gameId, entry)
      }
      return result
    })
  }

  async tick(gameId: string): Promise<TickResult | NotFound> {
    const entry = this.games.get(gameId)
    if (!entry) return reject('game_not_found')

    return await entry.mutex.runExclusive(() => {
      const result = entry.engine.tick()

      if (!result.success) {
        logEvent('game.tick', { gameId, reason: result.reason })
        return result
      }

      logEvent('game.tick', {
        gameId,
        phase: result.phase,
        formingRoundsRemaining: result.formingRoundsRemaining,
        roundsRemaining: result.roundsRemaining,
      })

      if (result.roundCompleted) {
        this.afterRound(gameId, entry)
      }
      return result
    })
  }

  /** Ticks the game every `intervalMs` until it finishes or is cleaned up. */
  startClock(gameId: string, intervalMs: number): boolean {
    const entry = this.games.get(gameId)
    if (!entry || entry.clock !== null || intervalMs <= 0) return false

    entry.clock = setInterval(() => {
      this.tick(gameId).catch(error => {
        this.stopClock(gameId)
        logError('game.clock.error', error, { gameId })
      })
    }, intervalMs)
    entry.clock.unref()

    logEvent('game.clock.start', { gameId, intervalMs })
    return true
  }

  stopClock(gameId: string): void {
    const entry = this.games.get(gameId)
    if (entry?.clock) {
      clearInterval(entry.clock)
      entry.clock = null
    }
  }

  queryState(gameId: string): GameSnapshot | undefined {
    return this.games.get(gameId)?.engine.queryState()
  }

  getStandings(gameId: string): { phase: GamePhase; standings: PlayerView[]; winners: PlayerId[] | null } | undefined {
    const entry = this.games.get(gameId)
    if (!entry) return undefined
    const phase = entry.engine.getPhase()
    return {
      phase,
      standings: entry.engine.standings(),
      winners: phase === 'finished' ? entry.engine.winners() : null,
    }
  }

  getTurns(gameId: string): TurnRecord[] | undefined {
    return this.games.get(gameId)?.engine.turns()
  }

  hasGame(gameId: string): boolean {
    return this.games.has(gameId)
  }

  cleanupGame(gameId: string): void {
    this.stopClock(gameId)
    const existed = this.games.delete(gameId)
    logEvent('game.cleanup', { gameId, existed })
  }

  listGames(): GameSummary[] {
    return Array.from(this.games.entries()).map(([gameId, entry]) => {
      const snapshot = entry.engine.queryState()
      return {
        gameId,
        phase: snapshot.phase,
        players: snapshot.players.length,
        round: snapshot.round,
        roundsRemaining: snapshot.roundsRemaining,
        createdAt: entry.createdAt,
        finishedAt: entry.engine.getFinishedAt(),
      }
    })
  }

  getActiveGameCount(): number {
    return this.listGames().filter(game => game.phase === 'active').length
  }

  getFinishedGameCount(): number {
    return this.listGames().filter(game => game.phase === 'finished').length
  }

  private afterRound(gameId: string, entry: GameEntry): void {
    const snapshot = entry.engine.queryState()
    logEvent('round.complete', { gameId, round: snapshot.round, roundsRemaining: snapshot.roundsRemaining })
    this.emit({ type: 'roundCompleted', gameId, round: snapshot.round, roundsRemaining: snapshot.roundsRemaining })

    if (snapshot.phase === 'finished') {
      this.stopClock(gameId)
      const winners = entry.engine.winners()
      const standings = entry.engine.standings()
      logEvent('game.end', {
        gameId,
        winners,
        scores: standings.map(p => ({ id: p.id, score: p.score })),
        claimed: entry.engine.claimedCells(),
        pot: entry.engine.pot(),
      })
      this.emit({ type: 'gameFinished', gameId, winners, standings })
    }
  }

  // Runs after the engine has changed; a failing listener must not undo the caller's result
  private emit(event: GameEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        logError('game.listener.error', error, { gameId: event.gameId, type: event.type })
      }
    }
  }
}
