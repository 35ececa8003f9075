import type { BufferPool } from '../buffers/buffer-pool.js'
import type { ServerConfig } from '../config/schema.js'
import type { Blacklist } from '../protection/blacklist.js'
import type { ServerLifecycle } from '../server/lifecycle.js'
import type { Logger } from '../utils/logger.js'

/**
 * Collaborators a listener can share with its siblings. Anything left out
 * is created per listener.
 */
export interface ListenerDependencies {
  /** Source screening (default: built-in abuse ranges) */
  blacklist?: Blacklist
  /** Buffer pool for received payloads */
  bufferPool?: BufferPool
  /** Upper bound on stop() waiting for the receive loop, in ms */
  stopTimeoutMs?: number
  logger?: Logger
}

/**
 * A bound listener. Binding happens when the listener is created; start()
 * begins handing traffic to the processor.
 */
export interface Listener extends ServerLifecycle {
  readonly config: ServerConfig
}
