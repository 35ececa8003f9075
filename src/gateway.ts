/**
 * Gateway
 *
 * Builds the configured UDP and TCP listeners around one shared
 * blacklist and buffer pool, and runs them under one cancellation
 * signal.
 */

import { createTcpListener } from './adapters/tcp.js'
import type { Listener } from './adapters/types.js'
import { createUdpListener } from './adapters/udp.js'
import { BufferPool } from './buffers/buffer-pool.js'
import { parseGatewayConfig, type GatewayConfig } from './config/schema.js'
import type { MessageProcessor } from './core/router.js'
import { Errors } from './errors/index.js'
import { Blacklist, createDefaultBlacklist } from './protection/blacklist.js'
import { createLogger, type Logger } from './utils/logger.js'

const defaultLogger = createLogger('gateway')

export interface GatewayOptions {
  /** Replaces the built-in blacklist and any configured sets */
  blacklist?: Blacklist
  bufferPool?: BufferPool
  /** Upper bound on each listener's stop(), in ms */
  stopTimeoutMs?: number
  logger?: Logger
}

export interface Gateway {
  readonly config: GatewayConfig
  readonly blacklist: Blacklist
  readonly listeners: readonly Listener[]
  readonly isRunning: boolean

  /**
   * Stop every running listener.
   *
   * @throws GatewayError INVALID_STATE when nothing is running
   */
  stop(): Promise<void>

  /** Dispose every listener. Safe to call any number of times. */
  dispose(): Promise<void>
}

/**
 * Validate `input`, bind every configured listener and start them.
 * A listener that fails to bind disposes the ones already bound.
 *
 * @throws GatewayError INVALID_CONFIG, or the bind error
 */
export async function startGateway(
  input: unknown,
  processor: MessageProcessor,
  options: GatewayOptions = {}
): Promise<Gateway> {
  const config = parseGatewayConfig(input)
  const logger = options.logger ?? defaultLogger
  const blacklist = options.blacklist ?? createDefaultBlacklist(config.blacklist)
  const bufferPool = options.bufferPool ?? new BufferPool()
  const deps = { blacklist, bufferPool, stopTimeoutMs: options.stopTimeoutMs }

  const listeners: Listener[] = []
  try {
    if (config.udp) {
      listeners.push(await createUdpListener(processor, config.udp, { ...deps, logger: logger.child({ listener: 'udp' }) }))
    }
    if (config.tcp) {
      listeners.push(await createTcpListener(processor, config.tcp, { ...deps, logger: logger.child({ listener: 'tcp' }) }))
    }
  } catch (err) {
    await Promise.all(listeners.map((listener) => listener.dispose()))
    throw err
  }

  const controller = new AbortController()
  for (const listener of listeners) {
    listener.start(controller)
  }
  logger.info(
    {
      listeners: listeners.map((listener) => `${listener.config.protocol}://${listener.config.address}:${listener.config.port}`),
      blacklists: blacklist.labels(),
    },
    'Gateway started'
  )

  let disposal: Promise<void> | null = null

  return {
    config,
    blacklist,
    listeners,

    get isRunning(): boolean {
      return listeners.some((listener) => listener.isRunning)
    },

    async stop(): Promise<void> {
      const running = listeners.filter((listener) => listener.isRunning)
      if (running.length === 0) throw Errors.invalidState('Gateway is not running')
      await Promise.all(running.map((listener) => listener.stop()))
      logger.info('Gateway stopped')
    },

    dispose(): Promise<void> {
      disposal ??= Promise.all(listeners.map((listener) => listener.dispose())).then(() => {
        logger.info('Gateway disposed')
      })
      return disposal
    },
  }
}
