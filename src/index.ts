/**
 * qsogate - Logging Application Protocol Gateway
 *
 * Receives status broadcasts from amateur-radio logging applications over
 * UDP and TCP, screens their senders, and routes decoded messages to a
 * handler.
 */

// === Gateway ===
export { startGateway } from './gateway.js'
export type { Gateway, GatewayOptions } from './gateway.js'

// === Listeners ===
export { createUdpListener, createTcpListener } from './adapters/index.js'
export type {
  Listener,
  ListenerDependencies,
  UdpListener,
  UdpListenerDependencies,
  TcpListener,
} from './adapters/index.js'

// === Server lifecycle ===
export { createServerLifecycle, handOff, DEFAULT_STOP_TIMEOUT_MS } from './server/index.js'
export type { ServerLifecycle, ServerLifecycleOptions, ServerState, ListenerTransport } from './server/index.js'

// === Core ===
export {
  createMessageRouter,
  createTagRegistry,
  createValidatorRegistry,
  readRootTag,
  createXmlDocumentParser,
} from './core/index.js'
export type {
  MessageRouter,
  MessageRouterOptions,
  MessageProcessor,
  MessageDispatcher,
  RouteOutcome,
  TagRegistry,
  ValidatorRegistry,
  TaggedMessage,
  PayloadDecoder,
  MessageValidator,
  XmlElement,
  XmlDocumentParser,
  XmlDocumentOptions,
} from './core/index.js'

// === Logging application messages ===
export {
  createLogMessageRouter,
  dispatchLogMessage,
  logMessageDecoders,
  contactInfoHasMinimumContent,
  defaultLogMessageValidators,
  appInfoSchema,
  contactInfoSchema,
  contactDeleteSchema,
  spotSchema,
  radioInfoSchema,
  dynamicResultsSchema,
  LOG_MESSAGE_ARRAY_PATHS,
} from './messages/index.js'
export type {
  LogMessageRouter,
  LogMessageRouterOptions,
  LogMessageHandler,
  LogMessage,
  LogMessageMap,
  LogMessageTag,
  LogMessageDecoders,
  AppInfo,
  ContactInfo,
  ContactReplace,
  ContactDelete,
  LookupInfo,
  Spot,
  RadioInfo,
  DynamicResults,
} from './messages/index.js'

// === Protection ===
export {
  Blacklist,
  createDefaultBlacklist,
  DEFAULT_BLACKLIST,
  RateLimiter,
  SourceRateLimiter,
} from './protection/index.js'
export type { BlacklistVerdict, RateLimiterOptions, SourceRateLimiterOptions, Clock } from './protection/index.js'

// === Buffers ===
export { BufferPool } from './buffers/index.js'
export type { OwnedBuffer, BufferPoolOptions, BufferPoolStats } from './buffers/index.js'

// === Configuration ===
export {
  serverConfigSchema,
  gatewayConfigSchema,
  blacklistConfigSchema,
  resolveServerConfig,
  parseGatewayConfig,
  DEFAULT_DATAGRAM_BUFFER_SIZE,
  DEFAULT_STREAM_BUFFER_SIZE,
} from './config/index.js'
export type {
  ServerConfig,
  ServerConfigInput,
  GatewayConfig,
  GatewayConfigInput,
  ListenerProtocol,
} from './config/index.js'

// === Errors ===
export { GatewayError, Errors, ErrorCodes, getErrorCode } from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, ConfigIssue } from './errors/index.js'

// === Types ===
export type { Endpoint } from './types/index.js'
export { toEndpoint, formatEndpoint } from './types/index.js'

// === Utilities ===
export { createLogger, getLogger } from './utils/index.js'
export type { Logger } from './utils/index.js'
