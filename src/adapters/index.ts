// UDP listener
export { createUdpListener } from './udp.js'
export type { UdpListener, UdpListenerDependencies } from './udp.js'

// TCP listener
export { createTcpListener } from './tcp.js'
export type { TcpListener } from './tcp.js'

export type { Listener, ListenerDependencies } from './types.js'
