import type { Server as SocketIOServer } from 'socket.io'

// Decorated by fastify-socket.io on register
declare module 'fastify' {
  interface FastifyInstance {
    io: SocketIOServer
  }
}
