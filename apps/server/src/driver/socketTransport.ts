import { io, Socket } from 'socket.io-client'
import type { GameSnapshot } from '../engine/types.js'
import type { ClientToServerEvents, ServerToClientEvents } from '../types/socket.js'
import { TransportError } from './transport.js'
import type { GameTransport, SubmitOutcome, SubmitTurnRequest } from './transport.js'

export interface SocketTransportOptions {
  // Full namespace URL, e.g. http://localhost:9001/game
  url: string
  ackTimeoutMs?: number
  connectTimeoutMs?: number
}

/** Reaches a game server over its Socket.IO `/game` namespace. */
export class SocketTransport implements GameTransport {
  private socket: Socket<ServerToClientEvents, ClientToServerEvents>
  private readonly ackTimeoutMs: number

  constructor(options: SocketTransportOptions) {
    this.ackTimeoutMs = options.ackTimeoutMs ?? 5000
    this.socket = io(options.url, {
      transports: ['websocket'],
      timeout: options.connectTimeoutMs ?? 5000,
      reconnection: true,
    })
  }

  get connected(): boolean {
    return this.socket.connected
  }

  async queryState(gameId: string): Promise<GameSnapshot | null> {
    this.ensureConnected()
    try {
      const response = await this.socket.timeout(this.ackTimeoutMs).emitWithAck('queryState', { gameId })
      if (response.success) return response.state
      if (response.reason === 'game_not_found') return null
      throw new TransportError(`queryState rejected: ${response.reason}`)
    } catch (error) {
      if (error instanceof TransportError) throw error
      throw new TransportError('queryState did not complete', { cause: error })
    }
  }

  async submitTurn(request: SubmitTurnRequest): Promise<SubmitOutcome> {
    this.ensureConnected()
    try {
      return await this.socket.timeout(this.ackTimeoutMs).emitWithAck('submitTurn', request)
    } catch (error) {
      throw new TransportError('submitTurn did not complete', { cause: error })
    }
  }

  async close(): Promise<void> {
    this.socket.disconnect()
  }

  private ensureConnected(): void {
    if (!this.socket.connected) {
      // socket.io-client reconnects on its own; the driver retries after backoff
      throw new TransportError('Not connected to game server')
    }
  }
}
