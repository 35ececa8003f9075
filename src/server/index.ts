export { createServerLifecycle, handOff, DEFAULT_STOP_TIMEOUT_MS } from './lifecycle.js'
export type { ServerLifecycle, ServerLifecycleOptions, ServerState, ListenerTransport } from './lifecycle.js'
