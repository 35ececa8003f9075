/**
 * Server Configuration
 *
 * Bind settings for the UDP and TCP listeners, validated with zod.
 * Settings are immutable once a listener has been built from them.
 */

import { isIP } from 'node:net'
import { z } from 'zod'
import { Errors, type ConfigIssue } from '../errors/index.js'

/** Default UDP datagram buffer, sized around a typical Ethernet MTU */
export const DEFAULT_DATAGRAM_BUFFER_SIZE = 1500

/** Default TCP stream buffer */
export const DEFAULT_STREAM_BUFFER_SIZE = 16384

export type ListenerProtocol = 'udp' | 'tcp'

export const serverConfigSchema = z.object({
  /** IP literal to bind (default: '::1') */
  address: z
    .string()
    .default('::1')
    .refine((address) => isIP(address) !== 0, { message: 'Invalid IP address' }),
  /** Port to bind, 1-65535 */
  port: z
    .number({ required_error: 'Port is required' })
    .int()
    .min(1, { message: 'Port number must be between 1 and 65535' })
    .max(65535, { message: 'Port number must be between 1 and 65535' }),
  /** Receive buffer size in bytes; 0 or absent uses the protocol default */
  bufferSize: z.number().int().nonnegative().optional(),
  /** Allow the address to be shared with other sockets (default: true) */
  enableReuseAddress: z.boolean().default(true),
  /** UDP only: datagrams accepted per source address per minute (default: 60) */
  requestsPerMinutePerIp: z.number().int().positive().default(60),
})

export type ServerConfigInput = z.input<typeof serverConfigSchema>

/**
 * Validated server settings with the protocol buffer default applied
 */
export interface ServerConfig {
  readonly protocol: ListenerProtocol
  readonly address: string
  readonly port: number
  readonly bufferSize: number
  readonly enableReuseAddress: boolean
  readonly requestsPerMinutePerIp: number
}

export const blacklistConfigSchema = z.record(z.string().min(1), z.array(z.string().min(1)))

export const gatewayConfigSchema = z
  .object({
    udp: serverConfigSchema.optional(),
    tcp: serverConfigSchema.optional(),
    /** Extra blacklist sets, label -> CIDR ranges */
    blacklist: blacklistConfigSchema.optional(),
  })
  .refine((config) => config.udp !== undefined || config.tcp !== undefined, {
    message: 'At least one of udp or tcp must be configured',
    path: ['udp'],
  })

export type GatewayConfigInput = z.input<typeof gatewayConfigSchema>
export type GatewayConfig = z.output<typeof gatewayConfigSchema>

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.') || 'root',
    message: issue.message,
  }))
}

/**
 * Validate listener settings and fill in the protocol's buffer default.
 *
 * @throws GatewayError with code INVALID_CONFIG listing every failed field
 */
export function resolveServerConfig(input: unknown, protocol: ListenerProtocol): ServerConfig {
  const result = serverConfigSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidConfig(toIssues(result.error))
  }

  const { address, port, bufferSize, enableReuseAddress, requestsPerMinutePerIp } = result.data
  const fallback = protocol === 'udp' ? DEFAULT_DATAGRAM_BUFFER_SIZE : DEFAULT_STREAM_BUFFER_SIZE

  return Object.freeze({
    protocol,
    address,
    port,
    bufferSize: bufferSize && bufferSize > 0 ? bufferSize : fallback,
    enableReuseAddress,
    requestsPerMinutePerIp,
  })
}

/**
 * Validate a parsed gateway configuration document.
 *
 * @throws GatewayError with code INVALID_CONFIG
 */
export function parseGatewayConfig(input: unknown): GatewayConfig {
  const result = gatewayConfigSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidConfig(toIssues(result.error))
  }
  return result.data
}
