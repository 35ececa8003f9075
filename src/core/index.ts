export { createMessageRouter } from './router.js'
export type {
  MessageRouter,
  MessageRouterOptions,
  MessageProcessor,
  MessageDispatcher,
  RouteOutcome,
} from './router.js'

export { createTagRegistry, createValidatorRegistry } from './registry.js'
export type {
  TagRegistry,
  ValidatorRegistry,
  TaggedMessage,
  PayloadDecoder,
  MessageValidator,
} from './registry.js'

export { readRootTag, createXmlDocumentParser } from './xml.js'
export type { XmlElement, XmlDocumentParser, XmlDocumentOptions } from './xml.js'
