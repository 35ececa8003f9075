/**
 * UDP Listener
 *
 * Receives broadcast datagrams from logging applications and hands each
 * one to a MessageProcessor.
 *
 * Per datagram, in order:
 *   sender resolved -> not blacklisted -> under the rate limit
 *   -> non-empty -> fits the configured buffer -> copied and handed off
 *
 * Rejected datagrams are logged and dropped; nothing is sent back.
 */

import { createSocket, type RemoteInfo, type Socket as UdpSocket } from 'node:dgram'
import { isIP } from 'node:net'
import { BufferPool } from '../buffers/buffer-pool.js'
import { resolveServerConfig, type ServerConfig, type ServerConfigInput } from '../config/schema.js'
import type { MessageProcessor } from '../core/router.js'
import { createDefaultBlacklist } from '../protection/blacklist.js'
import { SourceRateLimiter } from '../protection/rate-limiter.js'
import { createServerLifecycle, handOff, type ListenerTransport } from '../server/lifecycle.js'
import { formatEndpoint, toEndpoint } from '../types/endpoint.js'
import { createLogger } from '../utils/logger.js'
import { untilAborted } from '../utils/signals.js'
import type { Listener, ListenerDependencies } from './types.js'

const defaultLogger = createLogger('udp-listener')

const RATE_WINDOW_MS = 60_000

/**
 * UDP listener dependencies
 */
export interface UdpListenerDependencies extends ListenerDependencies {
  /** Per-source limiter; by default one is built from requestsPerMinutePerIp */
  rateLimiter?: SourceRateLimiter
}

/**
 * UDP listener interface
 */
export interface UdpListener extends Listener {
  /** Get the underlying socket (for testing) */
  readonly socket: UdpSocket
}

function bind(socket: UdpSocket, config: ServerConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      socket.close()
      reject(err)
    }
    socket.once('error', onError)
    socket.bind(config.port, config.address, () => {
      socket.off('error', onError)
      resolve()
    })
  })
}

/**
 * Create a UDP listener bound to the configured address.
 *
 * @throws GatewayError INVALID_CONFIG before any socket is created
 */
export async function createUdpListener(
  processor: MessageProcessor,
  input: ServerConfigInput,
  deps: UdpListenerDependencies = {}
): Promise<UdpListener> {
  const config = resolveServerConfig(input, 'udp')
  const logger = deps.logger ?? defaultLogger
  const blacklist = deps.blacklist ?? createDefaultBlacklist()
  const pool = deps.bufferPool ?? new BufferPool()

  const socket = createSocket({
    type: isIP(config.address) === 6 ? 'udp6' : 'udp4',
    reuseAddr: config.enableReuseAddress,
  })
  await bind(socket, config)

  socket.on('error', (err) => {
    logger.error({ err, port: config.port }, 'UDP socket error')
  })

  const rateLimiter =
    deps.rateLimiter ??
    new SourceRateLimiter({ maxRequests: config.requestsPerMinutePerIp, windowMs: RATE_WINDOW_MS })

  function accept(data: Buffer, rinfo: RemoteInfo, signal: AbortSignal): void {
    const endpoint = toEndpoint(rinfo.address, rinfo.port, rinfo.family)
    if (!endpoint) {
      logger.warn({ length: data.length }, 'Datagram received with no sender address')
      return
    }

    const source = formatEndpoint(endpoint)
    const verdict = blacklist.check(endpoint.address)
    if (verdict.blacklisted) {
      logger.warn({ source, blacklist: verdict.label }, 'Dropped datagram from blacklisted host')
      return
    }

    if (!rateLimiter.allowRequest(endpoint.address)) {
      logger.warn({ source, limit: rateLimiter.maxRequests }, 'Rate limit exceeded')
      return
    }

    if (data.length === 0) {
      logger.warn({ source }, 'Dropped empty datagram')
      return
    }

    if (data.length > config.bufferSize) {
      logger.warn({ source, length: data.length, bufferSize: config.bufferSize }, 'Datagram exceeds buffer size')
      return
    }

    logger.debug({ source, length: data.length }, 'Datagram received')

    const message = pool.rent(data.length)
    data.copy(message.bytes)
    void handOff(processor, message, endpoint, signal, logger)
  }

  const transport: ListenerTransport = {
    protocol: 'udp',

    async receive(signal: AbortSignal): Promise<void> {
      const onMessage = (data: Buffer, rinfo: RemoteInfo) => {
        try {
          accept(data, rinfo, signal)
        } catch (err) {
          logger.error({ err, address: rinfo.address }, 'Failed to accept datagram')
        }
      }

      socket.on('message', onMessage)
      logger.info({ address: config.address, port: config.port }, 'UDP listener receiving')
      try {
        await untilAborted(signal)
      } finally {
        socket.off('message', onMessage)
      }
    },

    close(): Promise<void> {
      if (!deps.rateLimiter) rateLimiter.shutdown()
      return new Promise((resolve) => {
        socket.close(() => resolve())
      })
    },
  }

  const lifecycle = createServerLifecycle(transport, { logger, stopTimeoutMs: deps.stopTimeoutMs })
  return Object.assign(lifecycle, { config, socket })
}
