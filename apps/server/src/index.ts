import { buildServer, NAMESPACE } from './app.js'
import { loadConfig } from './config.js'
import { logError, logEvent } from './utils/eventLog.js'

const config = loadConfig()
const { app, service } = await buildServer({ config })

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EADDRINUSE'
}

// Graceful shutdown handling
const shutdown = async (signal: string) => {
  logEvent('server.shutdown', { signal })
  for (const game of service.listGames()) {
    service.stopClock(game.gameId)
  }
  await app.close()
  logEvent('server.closed', {})
  process.exit(0)
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch(error => {
      logError('server.shutdown.error', error, { signal })
      process.exit(1)
    })
  })
}

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host })

    logEvent('server.start', {
      port: config.port,
      namespace: NAMESPACE,
      turnOrder: config.turnOrder,
      tickIntervalMs: config.tickIntervalMs,
    })
  } catch (error) {
    if (isAddressInUse(error)) {
      logEvent('server.error', {
        error: 'EADDRINUSE',
        port: config.port,
        message: `Port ${config.port} is already in use`,
      })
      process.exit(1)
    }
    app.log.error(error)
    process.exit(1)
  }
}

await start()
