/**
 * TCP Listener
 *
 * Accepts connections from logging applications. Each connection carries
 * one message: bytes are read until the peer ends the stream or the
 * configured buffer is full, then handed to a MessageProcessor.
 *
 * There is no framing. A message larger than the buffer is truncated
 * (with a warning) and the partial payload is still forwarded; several
 * messages on one connection arrive as one payload.
 */

import { createServer, type Server, type Socket } from 'node:net'
import { BufferPool } from '../buffers/buffer-pool.js'
import { resolveServerConfig, type ServerConfig, type ServerConfigInput } from '../config/schema.js'
import type { MessageProcessor } from '../core/router.js'
import { createDefaultBlacklist } from '../protection/blacklist.js'
import { createServerLifecycle, handOff, type ListenerTransport } from '../server/lifecycle.js'
import { formatEndpoint, toEndpoint } from '../types/endpoint.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { untilAborted } from '../utils/signals.js'
import type { Listener, ListenerDependencies } from './types.js'

const defaultLogger = createLogger('tcp-listener')

/**
 * TCP listener interface
 */
export interface TcpListener extends Listener {
  /** Get the underlying server (for testing) */
  readonly server: Server
}

function listen(server: Server, config: ServerConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err)
    server.once('error', onError)
    server.listen({ port: config.port, host: config.address }, () => {
      server.off('error', onError)
      resolve()
    })
  })
}

/**
 * Read into `target` until the stream ends or `target` is full.
 * Returns the number of bytes read.
 */
async function readOnce(socket: Socket, target: Buffer, source: string, logger: Logger): Promise<number> {
  let total = 0
  for await (const chunk of socket) {
    if (!Buffer.isBuffer(chunk)) continue

    const take = Math.min(chunk.length, target.length - total)
    chunk.copy(target, total, 0, take)
    total += take

    if (total === target.length) {
      logger.warn({ source, bufferSize: target.length }, 'Stream filled the buffer, message may be truncated')
      break
    }
  }
  return total
}

/**
 * Create a TCP listener bound to the configured address.
 *
 * @throws GatewayError INVALID_CONFIG before any socket is created
 */
export async function createTcpListener(
  processor: MessageProcessor,
  input: ServerConfigInput,
  deps: ListenerDependencies = {}
): Promise<TcpListener> {
  const config = resolveServerConfig(input, 'tcp')
  const logger = deps.logger ?? defaultLogger
  const blacklist = deps.blacklist ?? createDefaultBlacklist()
  const pool = deps.bufferPool ?? new BufferPool()

  const server = createServer()
  await listen(server, config)

  server.on('error', (err) => {
    logger.error({ err, port: config.port }, 'TCP server error')
  })

  const connections = new Set<Socket>()
  let accept: ((socket: Socket) => void) | null = null

  server.on('connection', (socket) => {
    connections.add(socket)
    socket.once('close', () => connections.delete(socket))
    socket.on('error', (err) => {
      logger.debug({ err, address: socket.remoteAddress }, 'Connection error')
    })

    if (!accept) {
      socket.destroy()
      return
    }
    accept(socket)
  })

  async function handleConnection(socket: Socket, signal: AbortSignal): Promise<void> {
    const endpoint = toEndpoint(socket.remoteAddress, socket.remotePort, socket.remoteFamily)
    if (!endpoint) {
      logger.warn('Connection received with no remote endpoint')
      return
    }

    const source = formatEndpoint(endpoint)
    logger.debug({ source }, 'Connection accepted')

    const verdict = blacklist.check(endpoint.address)
    if (verdict.blacklisted) {
      logger.warn({ source, blacklist: verdict.label }, 'Rejected connection from blacklisted host')
      return
    }

    const onAbort = () => socket.destroy()
    signal.addEventListener('abort', onAbort, { once: true })
    try {
      await pool.use(config.bufferSize, async (buffer) => {
        const total = await readOnce(socket, buffer.bytes, source, logger)
        if (total === 0) {
          logger.warn({ source }, 'Connection closed without data')
          return
        }

        const message = pool.rent(total)
        buffer.bytes.copy(message.bytes, 0, 0, total)
        void handOff(processor, message, endpoint, signal, logger)
      })
    } finally {
      signal.removeEventListener('abort', onAbort)
    }
  }

  const transport: ListenerTransport = {
    protocol: 'tcp',

    async receive(signal: AbortSignal): Promise<void> {
      accept = (socket) => {
        void handleConnection(socket, signal)
          .catch((err: unknown) => {
            if (signal.aborted) {
              logger.debug({ err }, 'Connection closed by cancellation')
              return
            }
            logger.error({ err, address: socket.remoteAddress }, 'Error handling connection')
          })
          .finally(() => socket.destroy())
      }

      logger.info({ address: config.address, port: config.port }, 'TCP listener accepting')
      try {
        await untilAborted(signal)
      } finally {
        accept = null
      }
    },

    close(): Promise<void> {
      for (const socket of connections) socket.destroy()
      return new Promise((resolve) => {
        server.close((err) => {
          if (err) logger.error({ err }, 'Failed to close TCP server')
          resolve()
        })
      })
    },
  }

  const lifecycle = createServerLifecycle(transport, { logger, stopTimeoutMs: deps.stopTimeoutMs })
  return Object.assign(lifecycle, { config, server })
}
