/**
 * Server Lifecycle
 *
 * Start/stop/dispose state machine shared by the UDP and TCP listeners.
 * The protocol-specific receive loop is supplied as a ListenerTransport.
 *
 *   stopped --start--> running --stop--> stopped
 *   any --dispose--> disposed (terminal)
 */

import type { ListenerProtocol } from '../config/schema.js'
import type { MessageProcessor } from '../core/router.js'
import type { OwnedBuffer } from '../buffers/buffer-pool.js'
import { Errors } from '../errors/index.js'
import { formatEndpoint, type Endpoint } from '../types/endpoint.js'
import { createLogger, type Logger } from '../utils/logger.js'
import { delay } from '../utils/signals.js'

const defaultLogger = createLogger('server-lifecycle')

/** How long stop() waits for the receive loop to exit */
export const DEFAULT_STOP_TIMEOUT_MS = 1000

export type ServerState = 'stopped' | 'running' | 'disposed'

/**
 * Protocol-specific half of a listener
 */
export interface ListenerTransport {
  readonly protocol: ListenerProtocol

  /** Receive until `signal` aborts. Resolves once the loop has exited. */
  receive(signal: AbortSignal): Promise<void>

  /** Release the bound socket. Called once, on dispose. */
  close(): Promise<void>
}

export interface ServerLifecycleOptions {
  /** Upper bound on stop() waiting for the receive loop (default: 1000) */
  stopTimeoutMs?: number
  logger?: Logger
}

export interface ServerLifecycle {
  readonly state: ServerState
  readonly isRunning: boolean
  readonly isDisposed: boolean

  /**
   * Launch the receive loop in the background. A controller is created
   * when none is supplied.
   *
   * @throws GatewayError INVALID_STATE when running or disposed
   */
  start(controller?: AbortController): void

  /**
   * Cancel the receive loop and wait briefly for it to exit.
   *
   * @throws GatewayError INVALID_STATE when not running
   */
  stop(): Promise<void>

  /** Cancel, close the socket. Safe to call any number of times. */
  dispose(): Promise<void>
}

export function createServerLifecycle(
  transport: ListenerTransport,
  options: ServerLifecycleOptions = {}
): ServerLifecycle {
  const stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS
  const logger = options.logger ?? defaultLogger
  const protocol = transport.protocol

  let state: ServerState = 'stopped'
  let controller: AbortController | null = null
  let loop: Promise<void> | null = null
  let disposal: Promise<void> | null = null

  function runLoop(signal: AbortSignal): Promise<void> {
    return transport.receive(signal).catch((err: unknown) => {
      if (signal.aborted) {
        logger.debug({ err, protocol }, 'Receive loop ended by cancellation')
        return
      }
      logger.error({ err, protocol }, 'Receive loop failed')
    })
  }

  async function waitForLoop(task: Promise<void>): Promise<void> {
    const timeout = delay(stopTimeoutMs)
    const outcome = await Promise.race([task.then(() => 'exited' as const), timeout.promise.then(() => 'timeout' as const)])
    timeout.cancel()
    if (outcome === 'timeout') {
      logger.warn({ protocol, stopTimeoutMs }, 'Receive loop did not exit before the stop timeout')
    }
  }

  function detach(): { controller: AbortController | null; loop: Promise<void> | null } {
    const current = { controller, loop }
    controller = null
    loop = null
    return current
  }

  return {
    get state(): ServerState {
      return state
    },

    get isRunning(): boolean {
      return state === 'running'
    },

    get isDisposed(): boolean {
      return state === 'disposed'
    },

    start(supplied?: AbortController): void {
      if (state === 'disposed') throw Errors.invalidState('Server is disposed')
      if (state === 'running') throw Errors.invalidState('Server is already running')

      state = 'running'
      controller = supplied ?? new AbortController()
      loop = runLoop(controller.signal)
      logger.info({ protocol }, 'Server started')
    },

    async stop(): Promise<void> {
      if (state === 'disposed') throw Errors.invalidState('Server is disposed')
      if (state !== 'running') throw Errors.invalidState('Server is not running')

      state = 'stopped'
      const current = detach()
      current.controller?.abort()
      if (current.loop) await waitForLoop(current.loop)
      logger.info({ protocol }, 'Server stopped')
    },

    dispose(): Promise<void> {
      disposal ??= (async () => {
        state = 'disposed'
        const current = detach()
        current.controller?.abort()
        if (current.loop) await waitForLoop(current.loop)

        try {
          await transport.close()
        } catch (err) {
          logger.error({ err, protocol }, 'Failed to close listener socket')
        }
        logger.debug({ protocol }, 'Server disposed')
      })()
      return disposal
    },
  }
}

/**
 * Run one message through the processor off the receive loop, releasing
 * its buffer afterwards. The returned promise never rejects.
 */
export function handOff(
  processor: MessageProcessor,
  buffer: OwnedBuffer,
  endpoint: Endpoint,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  async function run(): Promise<void> {
    try {
      await processor.process(buffer.bytes, endpoint, signal)
    } finally {
      buffer.release()
    }
  }

  return run().catch((err: unknown) => {
    logger.error({ err, source: formatEndpoint(endpoint) }, 'Message processing failed')
  })
}
