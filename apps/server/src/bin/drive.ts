import 'dotenv/config'
import { parseDriverArgs, USAGE } from '../driver/cli.js'
import { SocketTransport } from '../driver/socketTransport.js'
import { TurnDriver } from '../driver/turnDriver.js'
import { createStrategy } from '../strategies/index.js'
import { logError, logEvent } from '../utils/eventLog.js'

async function main(): Promise<void> {
  const args = parseDriverArgs(process.argv.slice(2))
  if (!args.ok) {
    for (const error of args.errors) console.error(error)
    console.error(USAGE)
    process.exitCode = 1
    return
  }

  const { options } = args
  const transport = new SocketTransport({ url: options.serverUrl })
  const driver = new TurnDriver({
    gameId: options.gameId,
    playerId: options.playerId,
    strategy: createStrategy(options.strategy),
    transport,
    pollIntervalMs: options.pollIntervalMs,
  })

  const stop = () => driver.stop()
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  try {
    const report = await driver.run()
    logEvent('driver.report', { ...report })
    process.exitCode = report.reason === 'finished' || report.reason === 'stopped' ? 0 : 1
  } finally {
    await transport.close()
  }
}

main().catch(error => {
  logError('driver.crash', error)
  process.exitCode = 1
})
