export {
  serverConfigSchema,
  gatewayConfigSchema,
  blacklistConfigSchema,
  resolveServerConfig,
  parseGatewayConfig,
  DEFAULT_DATAGRAM_BUFFER_SIZE,
  DEFAULT_STREAM_BUFFER_SIZE,
} from './schema.js'
export type {
  ServerConfig,
  ServerConfigInput,
  GatewayConfig,
  GatewayConfigInput,
  ListenerProtocol,
} from './schema.js'
