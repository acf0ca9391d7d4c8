import { GameError, reject } from './errors.js'
import { Grid, indexToCoord, isAdjacent } from './grid.js'
import type {
  Coord,
  CellEntry,
  GameConfig,
  GamePhase,
  GameSnapshot,
  Move,
  Player,
  PlayerId,
  PlayerView,
  RegistrationRequest,
  RegistrationResult,
  StartResult,
  TickResult,
  TurnOrder,
  TurnOutcome,
  TurnRecord,
  TurnResult,
  ValidationResult,
} from './types.js'

/** Players allowed to register for a single game. */
export const PLAYER_LIMIT = 80

/** Allowed length of a player's display name. */
export const NAME_LENGTH = { min: 3, max: 16 } as const

export interface ResolvedGameConfig {
  dimensions: { width: number; height: number }
  buyIn: number
  formingRounds: number
  rounds: number
  maxPlayers: number
  turnOrder: TurnOrder
  opener: PlayerId | null
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0
}

/**
 * Checks a game configuration and fills in defaults.
 *
 * Throws `invalid_dimensions` for a board outside 1..MAX_DIMENSION and
 * `invalid_config` for anything else out of range.
 */
export function resolveConfig(config: GameConfig): ResolvedGameConfig {
  const { width, height } = config.dimensions
  if (!Grid.isValidExtent(width) || !Grid.isValidExtent(height)) {
    throw new GameError('invalid_dimensions', `Invalid board dimensions ${width}x${height}`)
  }
  if (!Number.isFinite(config.buyIn) || config.buyIn < 0) {
    throw new GameError('invalid_config', `buyIn must be a non-negative number, got ${config.buyIn}`)
  }
  if (!isNonNegativeInteger(config.formingRounds)) {
    throw new GameError('invalid_config', `formingRounds must be a non-negative integer, got ${config.formingRounds}`)
  }
  if (!Number.isInteger(config.rounds) || config.rounds < 1) {
    throw new GameError('invalid_config', `rounds must be a positive integer, got ${config.rounds}`)
  }
  const requestedPlayers = config.maxPlayers ?? PLAYER_LIMIT
  if (!Number.isInteger(requestedPlayers) || requestedPlayers < 1) {
    throw new GameError('invalid_config', `maxPlayers must be a positive integer, got ${requestedPlayers}`)
  }
  const turnOrder = config.turnOrder ?? 'any'
  if (turnOrder !== 'any' && turnOrder !== 'sequential') {
    throw new GameError('invalid_config', `Unknown turn order ${String(turnOrder)}`)
  }

  return {
    dimensions: { width, height },
    buyIn: config.buyIn,
    formingRounds: config.formingRounds,
    rounds: config.rounds,
    // Every player needs a starting cell of its own
    maxPlayers: Math.min(requestedPlayers, width * height, PLAYER_LIMIT),
    turnOrder,
    opener: config.opener ?? null,
  }
}

function toView(player: Player): PlayerView {
  return {
    id: player.id,
    name: player.name,
    position: { ...player.position },
    score: player.score,
    hasMoved: player.hasMoved,
  }
}

export class SquinkSplashEngine {
  private readonly config: ResolvedGameConfig
  private readonly grid: Grid
  private phase: GamePhase = 'forming'
  // Map keeps insertion order, which is the turn order
  private players = new Map<PlayerId, Player>()
  private formingRoundsRemaining: number
  private roundsRemaining: number
  private round = 0
  private history: TurnRecord[] = []
  private finishedAt: Date | undefined

  constructor(config: GameConfig) {
    this.config = resolveConfig(config)
    this.grid = new Grid(this.config.dimensions.width, this.config.dimensions.height)
    this.formingRoundsRemaining = this.config.formingRounds
    this.roundsRemaining = this.config.rounds
  }

  getConfig(): ResolvedGameConfig {
    return { ...this.config, dimensions: { ...this.config.dimensions } }
  }

  getPhase(): GamePhase {
    return this.phase
  }

  getFinishedAt(): Date | undefined {
    return this.finishedAt
  }

  registerPlayer(request: RegistrationRequest): RegistrationResult {
    if (this.phase === 'finished') return reject('game_finished')
    if (this.phase === 'active') return reject('already_started')

    const { id, payment } = request
    if (id.length === 0) return reject('unknown_player', 'Player id must not be empty')

    // Display names are optional; without one the id stands in and is not length-checked
    if (request.name !== undefined && (request.name.length < NAME_LENGTH.min || request.name.length > NAME_LENGTH.max)) {
      return reject('invalid_name')
    }
    const name = request.name ?? id

    if (!Number.isFinite(payment) || payment < this.config.buyIn) {
      return reject('insufficient_buy_in', `Payment ${payment} is below the buy-in of ${this.config.buyIn}`)
    }

    if (this.players.has(id)) return reject('already_registered')

    for (const player of this.players.values()) {
      if (player.name === name) return reject('name_taken')
    }

    if (this.players.size >= this.config.maxPlayers) return reject('max_players_reached')

    const player: Player = {
      id,
      name,
      position: this.startingPosition(this.players.size),
      score: 0,
      hasMoved: false,
      payment,
      joinedAt: new Date(),
    }
    this.players.set(id, player)

    return { success: true, player: toView(player) }
  }

  startGame(callerId?: PlayerId): StartResult {
    if (this.phase === 'finished') return reject('game_finished')
    if (this.phase === 'active') return reject('already_started')

    if (this.config.opener !== null && callerId !== this.config.opener) {
      return reject('not_opener')
    }

    if (this.formingRoundsRemaining > 0) {
      return reject('not_yet_formed', `${this.formingRoundsRemaining} forming round(s) remaining`)
    }

    if (this.players.size === 0) return reject('no_players')

    this.phase = 'active'
    this.round = 0
    this.roundsRemaining = this.config.rounds

    return { success: true, roundsRemaining: this.roundsRemaining }
  }

  // External clock signal: counts down forming rounds, or closes the current round
  tick(): TickResult {
    if (this.phase === 'finished') return reject('game_finished')

    let roundCompleted = false
    if (this.phase === 'forming') {
      this.formingRoundsRemaining = Math.max(0, this.formingRoundsRemaining - 1)
    } else {
      this.completeRound()
      roundCompleted = true
    }

    return {
      success: true,
      phase: this.phase,
      formingRoundsRemaining: this.formingRoundsRemaining,
      roundsRemaining: this.roundsRemaining,
      roundCompleted,
    }
  }

  validateTurn(playerId: PlayerId, move: Move): ValidationResult {
    if (this.phase === 'finished') return { valid: false, reason: 'game_finished' }
    if (this.phase !== 'active') return { valid: false, reason: 'game_not_active' }

    const player = this.players.get(playerId)
    if (!player) return { valid: false, reason: 'unknown_player' }

    if (!isAdjacent(player.position, move.target)) {
      return { valid: false, reason: 'illegal_move' }
    }

    if (!this.grid.contains(move.target)) {
      return { valid: false, reason: 'out_of_bounds' }
    }

    if (player.hasMoved) return { valid: false, reason: 'turn_already_submitted' }

    if (this.config.turnOrder === 'sequential' && this.nextToMove() !== playerId) {
      return { valid: false, reason: 'not_your_turn' }
    }

    return { valid: true }
  }

  submitTurn(playerId: PlayerId, move: Move): TurnResult {
    const validation = this.validateTurn(playerId, move)
    if (!validation.valid) return reject(validation.reason ?? 'illegal_move')

    const player = this.players.get(playerId)
    if (!player) return reject('unknown_player')

    const target: Coord = { x: move.target.x, y: move.target.y }
    const change = this.grid.claim(target, playerId, this.round)

    if (change.changed) {
      player.score++
      if (change.previousOwner !== null) {
        const previous = this.players.get(change.previousOwner)
        if (previous) previous.score--
      }
    }

    player.position = target
    player.hasMoved = true

    let outcome: TurnOutcome = 'painted'
    if (change.previousOwner === playerId) outcome = 'repainted'
    else if (change.previousOwner !== null) outcome = 'stolen'

    const turn: TurnRecord = {
      round: this.round,
      playerId,
      target: { ...target },
      outcome,
      previousOwner: change.previousOwner,
      timestamp: new Date(),
    }
    this.history.push(turn)

    let roundCompleted = false
    if (Array.from(this.players.values()).every(p => p.hasMoved)) {
      this.completeRound()
      roundCompleted = true
    }

    return {
      success: true,
      turn: { ...turn, target: { ...turn.target } },
      player: toView(player),
      roundCompleted,
      phase: this.phase,
      roundsRemaining: this.roundsRemaining,
    }
  }

  cellAt(coord: Coord): CellEntry | null {
    return this.grid.cellAt(coord)
  }

  getPlayer(id: PlayerId): PlayerView | undefined {
    const player = this.players.get(id)
    return player ? toView(player) : undefined
  }

  getPlayers(): PlayerView[] {
    return Array.from(this.players.values()).map(toView)
  }

  turns(): TurnRecord[] {
    return this.history.map(turn => ({ ...turn, target: { ...turn.target } }))
  }

  /** Players by score, highest first; equal scores keep registration order. */
  standings(): PlayerView[] {
    return this.getPlayers().sort((a, b) => b.score - a.score)
  }

  /** Every player holding the top score. Ties are all reported. */
  winners(): PlayerId[] {
    const players = this.getPlayers()
    if (players.length === 0) return []
    const top = Math.max(...players.map(p => p.score))
    return players.filter(p => p.score === top).map(p => p.id)
  }

  claimedCells(): number {
    return this.grid.claimedCount()
  }

  pot(): number {
    let total = 0
    for (const player of this.players.values()) {
      total += player.payment
    }
    return total
  }

  queryState(): GameSnapshot {
    return {
      phase: this.phase,
      dimensions: { ...this.config.dimensions },
      buyIn: this.config.buyIn,
      pot: this.pot(),
      rounds: this.config.rounds,
      roundsRemaining: this.roundsRemaining,
      formingRoundsRemaining: this.formingRoundsRemaining,
      round: this.round,
      turnOrder: this.config.turnOrder,
      grid: this.grid.snapshot(),
      players: this.getPlayers(),
      winners: this.phase === 'finished' ? this.winners() : null,
    }
  }

  private nextToMove(): PlayerId | undefined {
    for (const player of this.players.values()) {
      if (!player.hasMoved) return player.id
    }
    return undefined
  }

  private completeRound(): void {
    this.roundsRemaining = Math.max(0, this.roundsRemaining - 1)
    this.round++
    for (const player of this.players.values()) {
      player.hasMoved = false
    }
    if (this.roundsRemaining === 0) {
      this.phase = 'finished'
      this.finishedAt = new Date()
    }
  }

  // Spreads players over the board in registration order without collisions
  private startingPosition(index: number): Coord {
    const stride = Math.max(1, Math.floor(this.grid.size / this.config.maxPlayers))
    return indexToCoord(index * stride, this.grid.width)
  }
}
