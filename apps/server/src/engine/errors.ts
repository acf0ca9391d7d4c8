export type GameErrorReason =
  | 'invalid_dimensions'
  | 'invalid_config'
  | 'already_started'
  | 'insufficient_buy_in'
  | 'already_registered'
  | 'invalid_name'
  | 'name_taken'
  | 'max_players_reached'
  | 'not_opener'
  | 'not_yet_formed'
  | 'no_players'
  | 'game_not_active'
  | 'unknown_player'
  | 'illegal_move'
  | 'out_of_bounds'
  | 'turn_already_submitted'
  | 'not_your_turn'
  | 'game_finished'
  | 'no_legal_move'

// Reasons that only come from the service and transport layers
export type ServiceErrorReason = 'game_not_found' | 'duplicate_turn' | 'invalid_payload'

export type RejectionReason = GameErrorReason | ServiceErrorReason

const MESSAGES: Record<RejectionReason, string> = {
  invalid_dimensions: 'Board dimensions are out of range',
  invalid_config: 'Game configuration is invalid',
  already_started: 'The game has already started',
  insufficient_buy_in: 'Payment is below the buy-in',
  already_registered: 'Player is already registered',
  invalid_name: 'Player name must be 3 to 16 characters',
  name_taken: 'Player name is already taken',
  max_players_reached: 'The game is full',
  not_opener: 'Only the opener may start the game',
  not_yet_formed: 'Forming rounds have not elapsed yet',
  no_players: 'At least one player is required',
  game_not_active: 'The game does not accept turns right now',
  unknown_player: 'Player is not registered',
  illegal_move: 'Target is not adjacent to the current position',
  out_of_bounds: 'Target lies outside the board',
  turn_already_submitted: 'Turn was already submitted this round',
  not_your_turn: 'It is not this player\'s turn',
  game_finished: 'The game is finished',
  no_legal_move: 'No legal move is available',
  game_not_found: 'Game not found',
  duplicate_turn: 'Turn id was already applied',
  invalid_payload: 'Request payload is malformed',
}

export function describeReason(reason: RejectionReason): string {
  return MESSAGES[reason]
}

export class GameError extends Error {
  readonly reason: GameErrorReason

  constructor(reason: GameErrorReason, message: string = describeReason(reason)) {
    super(message)
    this.name = 'GameError'
    this.reason = reason
  }
}

export interface Rejection<R extends RejectionReason = GameErrorReason> {
  success: false
  reason: R
  message: string
}

export function reject<R extends RejectionReason>(reason: R, message?: string): Rejection<R> {
  return { success: false, reason, message: message ?? describeReason(reason) }
}
