import { v4 as uuidv4 } from 'uuid'
import type { RejectionReason } from '../engine/errors.js'
import type { GameSnapshot, Move, PlayerId } from '../engine/types.js'
import { observe } from '../strategies/types.js'
import type { PlayerStrategy } from '../strategies/types.js'
import { logError, logEvent } from '../utils/eventLog.js'
import { TransportError } from './transport.js'
import type { GameTransport } from './transport.js'

export type DriverStopReason = 'finished' | 'no_legal_move' | 'rejected' | 'retries_exhausted' | 'stopped' | 'crashed'

export interface DriverReport {
  gameId: string
  playerId: PlayerId
  strategy: string
  reason: DriverStopReason
  turnsSubmitted: number
  retries: number
  rejection?: RejectionReason
  // Set when reason is 'crashed'
  error?: string
}

export interface TurnDriverOptions {
  gameId: string
  playerId: PlayerId
  strategy: PlayerStrategy
  transport: GameTransport
  pollIntervalMs?: number
  initialBackoffMs?: number
  maxBackoffMs?: number
  // Unlimited when omitted
  maxRetries?: number
  sleep?: (ms: number) => Promise<void>
}

interface PendingTurn {
  round: number
  turnId: string
  move: Move
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Plays one player until the game ends.
 *
 * Each step re-reads the game before acting, so a turn whose answer was lost
 * in transit is never submitted twice: if the game already shows the move,
 * the driver just waits for the next round. Rule rejections stop the driver;
 * they are never retried with another move.
 */
export class TurnDriver {
  private readonly gameId: string
  private readonly playerId: PlayerId
  private readonly strategy: PlayerStrategy
  private readonly transport: GameTransport
  private readonly pollIntervalMs: number
  private readonly initialBackoffMs: number
  private readonly maxBackoffMs: number
  private readonly maxRetries: number | undefined
  private readonly sleep: (ms: number) => Promise<void>

  private stopped = false
  private turnsSubmitted = 0
  private retries = 0
  private consecutiveFailures = 0
  private pending: PendingTurn | null = null

  constructor(options: TurnDriverOptions) {
    this.gameId = options.gameId
    this.playerId = options.playerId
    this.strategy = options.strategy
    this.transport = options.transport
    this.pollIntervalMs = options.pollIntervalMs ?? 250
    this.initialBackoffMs = options.initialBackoffMs ?? 100
    this.maxBackoffMs = options.maxBackoffMs ?? 5000
    this.maxRetries = options.maxRetries
    this.sleep = options.sleep ?? defaultSleep
  }

  stop(): void {
    this.stopped = true
  }

  async run(): Promise<DriverReport> {
    logEvent('driver.start', { gameId: this.gameId, playerId: this.playerId, strategy: this.strategy.name })

    while (!this.stopped) {
      let snapshot: GameSnapshot | null
      try {
        snapshot = await this.transport.queryState(this.gameId)
      } catch (error) {
        if (!(error instanceof TransportError)) throw error
        if (!(await this.backOff('query', error))) return this.finish('retries_exhausted')
        continue
      }
      this.consecutiveFailures = 0

      if (snapshot === null) return this.finish('rejected', 'game_not_found')
      if (snapshot.phase === 'finished') return this.finish('finished')
      if (snapshot.phase === 'forming') {
        await this.sleep(this.pollIntervalMs)
        continue
      }

      const observable = observe(snapshot, this.playerId)
      if (!observable) return this.finish('rejected', 'unknown_player')

      const me = snapshot.players.find(p => p.id === this.playerId)
      if (me?.hasMoved || !this.isMyTurn(snapshot)) {
        // Either our last move landed or someone else is up; wait for the round to move on
        this.pending = null
        await this.sleep(this.pollIntervalMs)
        continue
      }

      let turn: PendingTurn
      if (this.pending && this.pending.round === snapshot.round) {
        // An earlier submission was lost before reaching the game: resend that same move
        turn = this.pending
      } else {
        const decision = this.strategy.decide(observable)
        if (!decision.ok) return this.finish('no_legal_move')
        turn = { round: snapshot.round, turnId: uuidv4(), move: decision.move }
      }

      try {
        const outcome = await this.transport.submitTurn({
          gameId: this.gameId,
          playerId: this.playerId,
          move: turn.move,
          turnId: turn.turnId,
        })
        this.pending = null
        this.consecutiveFailures = 0

        if (outcome.success) {
          this.turnsSubmitted++
          continue
        }
        if (outcome.reason === 'duplicate_turn') continue

        logEvent('driver.rejected', {
          gameId: this.gameId,
          playerId: this.playerId,
          target: turn.move.target,
          reason: outcome.reason,
        })
        return this.finish('rejected', outcome.reason)
      } catch (error) {
        if (!(error instanceof TransportError)) throw error
        this.pending = turn
        if (!(await this.backOff('submit', error))) return this.finish('retries_exhausted')
      }
    }

    return this.finish('stopped')
  }

  /** Report for a run that threw; lets a caller running many drivers keep the others' results. */
  crashed(error: unknown): DriverReport {
    this.stopped = true
    logError('driver.crash', error, { gameId: this.gameId, playerId: this.playerId, strategy: this.strategy.name })
    return {
      gameId: this.gameId,
      playerId: this.playerId,
      strategy: this.strategy.name,
      reason: 'crashed',
      turnsSubmitted: this.turnsSubmitted,
      retries: this.retries,
      error: error instanceof Error ? error.message : String(error),
    }
  }

  private isMyTurn(snapshot: GameSnapshot): boolean {
    if (snapshot.turnOrder !== 'sequential') return true
    const next = snapshot.players.find(p => !p.hasMoved)
    return next?.id === this.playerId
  }

  private async backOff(stage: 'query' | 'submit', error: TransportError): Promise<boolean> {
    this.retries++
    this.consecutiveFailures++
    if (this.maxRetries !== undefined && this.retries > this.maxRetries) {
      logError('driver.retries_exhausted', error, { gameId: this.gameId, playerId: this.playerId, stage })
      return false
    }

    const delay = Math.min(this.maxBackoffMs, this.initialBackoffMs * 2 ** (this.consecutiveFailures - 1))
    logEvent('driver.retry', {
      gameId: this.gameId,
      playerId: this.playerId,
      stage,
      attempt: this.consecutiveFailures,
      delayMs: delay,
      error: error.message,
    })
    await this.sleep(delay)
    return true
  }

  private finish(reason: DriverStopReason, rejection?: RejectionReason): DriverReport {
    const report: DriverReport = {
      gameId: this.gameId,
      playerId: this.playerId,
      strategy: this.strategy.name,
      reason,
      turnsSubmitted: this.turnsSubmitted,
      retries: this.retries,
      ...(rejection && { rejection }),
    }
    logEvent('driver.stop', { ...report })
    return report
  }
}

/** Runs several drivers side by side; one stopping or crashing leaves the others running. */
export async function runAll(drivers: TurnDriver[]): Promise<DriverReport[]> {
  return await Promise.all(drivers.map(driver => driver.run().catch((error: unknown) => driver.crashed(error))))
}
