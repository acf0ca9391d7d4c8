import type { GameSnapshot } from '../engine/types.js'
import type { GameService } from '../services/gameService.js'
import { toSubmitOutcome } from './transport.js'
import type { GameTransport, SubmitOutcome, SubmitTurnRequest } from './transport.js'

/** Talks to a GameService in the same process. */
export class LocalTransport implements GameTransport {
  constructor(private readonly service: GameService) {}

  async queryState(gameId: string): Promise<GameSnapshot | null> {
    return this.service.queryState(gameId) ?? null
  }

  async submitTurn(request: SubmitTurnRequest): Promise<SubmitOutcome> {
    return toSubmitOutcome(await this.service.submitTurn(request))
  }

  async close(): Promise<void> {}
}
