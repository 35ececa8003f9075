/**
 * Endpoint Types
 *
 * The resolved sender of a datagram or connection. Always present by the
 * time a message is handed to the router.
 */

export interface Endpoint {
  /** Remote IP address as reported by the socket */
  address: string

  /** Remote port */
  port: number

  /** Address family */
  family: 'IPv4' | 'IPv6'
}

/**
 * Build an endpoint from socket-reported values, or undefined if the
 * socket could not resolve its peer.
 */
export function toEndpoint(
  address: string | undefined,
  port: number | undefined,
  family?: string
): Endpoint | undefined {
  if (!address || port === undefined) return undefined
  return {
    address,
    port,
    family: family === 'IPv6' || address.includes(':') ? 'IPv6' : 'IPv4',
  }
}

/**
 * Format an endpoint for log lines: `1.2.3.4:5` or `[::1]:5`
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.family === 'IPv6'
    ? `[${endpoint.address}]:${endpoint.port}`
    : `${endpoint.address}:${endpoint.port}`
}
