/**
 * Console Gateway
 *
 * Listens for logging application broadcasts using config.json beside
 * this file and prints every decoded message.
 *
 * Run: npm run example
 */

import { readFile } from 'node:fs/promises'
import {
  createLogger,
  createLogMessageRouter,
  formatEndpoint,
  startGateway,
  type Endpoint,
  type LogMessageHandler,
} from '../src/index.js'

const logger = createLogger('console-gateway')

function print(kind: string, message: object, endpoint: Endpoint): Promise<void> {
  console.log(`${kind} from ${formatEndpoint(endpoint)}\n${JSON.stringify(message, null, 2)}`)
  return Promise.resolve()
}

const handler: LogMessageHandler = {
  handleAppInfo: (message, endpoint) => print('AppInfo', message, endpoint),
  handleContactInfo: (message, endpoint) => print('ContactInfo', message, endpoint),
  handleContactReplace: (message, endpoint) => print('ContactReplace', message, endpoint),
  handleContactDelete: (message, endpoint) => print('ContactDelete', message, endpoint),
  handleLookupInfo: (message, endpoint) => print('LookupInfo', message, endpoint),
  handleSpot: (message, endpoint) => print('Spot', message, endpoint),
  handleDynamicResults: (message, endpoint) => print('DynamicResults', message, endpoint),
  handleRadioInfo: (message, endpoint) => print('RadioInfo', message, endpoint),
}

async function main() {
  const configPath = new URL('./config.json', import.meta.url)
  const config: unknown = JSON.parse(await readFile(configPath, 'utf-8'))

  const gateway = await startGateway(config, createLogMessageRouter(handler))

  const shutdown = async () => {
    logger.info('Shutting down...')
    await gateway.dispose()
    process.exit(0)
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start gateway')
  process.exit(1)
})
