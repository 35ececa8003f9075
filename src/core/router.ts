/**
 * Router - Message Dispatch
 *
 * Takes a raw tagged payload through tag extraction, type resolution,
 * decoding, validation and dispatch. Every stage drops and logs on
 * failure; nothing thrown inside the pipeline escapes to the listener
 * that handed the bytes over.
 */

import type { Endpoint } from '../types/endpoint.js'
import { formatEndpoint } from '../types/endpoint.js'
import { createLogger, type Logger } from '../utils/logger.js'
import {
  createTagRegistry,
  createValidatorRegistry,
  type MessageValidator,
  type PayloadDecoder,
  type TagRegistry,
  type TaggedMessage,
  type ValidatorRegistry,
} from './registry.js'
import { createXmlDocumentParser, readRootTag, type XmlElement } from './xml.js'

const defaultLogger = createLogger('message-router')

/**
 * Entry point the listeners hand received bytes to. Never rejects.
 */
export interface MessageProcessor {
  process(data: Buffer, endpoint: Endpoint, signal?: AbortSignal): Promise<void>
}

/**
 * Where a message left the pipeline
 */
export type RouteOutcome =
  | 'dispatched'
  | 'malformed'
  | 'unknown-tag'
  | 'decode-failed'
  | 'invalid'
  | 'unhandled'
  | 'failed'

/**
 * Deliver a validated message to its handler operation. Resolves false
 * when no operation exists for the message's tag.
 */
export type MessageDispatcher<TMessage extends TaggedMessage> = (
  message: TMessage,
  endpoint: Endpoint,
  signal: AbortSignal
) => Promise<boolean>

/**
 * Router options
 */
export interface MessageRouterOptions<TMessage extends TaggedMessage> {
  /** Root tag -> decoder */
  decoders: Readonly<Record<string, PayloadDecoder<TMessage>>>
  /** Extra or replacement decoders for this instance */
  overrides?: Readonly<Record<string, PayloadDecoder<TMessage>>>
  /** Payload tag -> validator */
  validators?: Readonly<Record<string, MessageValidator<TMessage>>>
  /** Handler operation table */
  dispatch: MessageDispatcher<TMessage>
  /** Element paths that always decode to arrays */
  arrayPaths?: readonly string[]
  logger?: Logger
}

/**
 * Router interface
 */
export interface MessageRouter<TMessage extends TaggedMessage> extends MessageProcessor {
  /** Run the pipeline and report where the message ended up */
  route(data: Buffer, endpoint: Endpoint, signal?: AbortSignal): Promise<RouteOutcome>

  readonly registry: TagRegistry<TMessage>
  readonly validators: ValidatorRegistry<TMessage>
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
}

/**
 * Create a message router
 */
export function createMessageRouter<TMessage extends TaggedMessage>(
  options: MessageRouterOptions<TMessage>
): MessageRouter<TMessage> {
  const logger = options.logger ?? defaultLogger
  const registry = createTagRegistry(options.decoders, options.overrides)
  const validators = createValidatorRegistry(options.validators)
  const parser = createXmlDocumentParser({ arrayPaths: options.arrayPaths })
  const dispatch = options.dispatch

  async function runPipeline(data: Buffer, endpoint: Endpoint, signal: AbortSignal): Promise<RouteOutcome> {
    const source = formatEndpoint(endpoint)
    const text = stripBom(data.toString('utf-8'))

    // 1. Tag extraction
    const tag = readRootTag(text)
    if (!tag) {
      logger.warn({ source, length: data.length }, 'Malformed message: no root element')
      return 'malformed'
    }

    // 2. Type resolution
    const decode = registry.resolve(tag)
    if (!decode) {
      logger.warn({ source, tag }, 'Unknown message type')
      return 'unknown-tag'
    }

    // 3. Decode
    let message: TMessage
    try {
      const element: XmlElement = parser.parseRoot(text, tag)
      message = decode(element)
    } catch (err) {
      logger.warn({ err, source, tag }, 'Failed to decode message')
      return 'decode-failed'
    }

    // 4. Validate
    if (!validators.isValid(message)) {
      logger.warn({ source, tag, message }, 'Invalid message received')
      return 'invalid'
    }

    // 5. Dispatch
    const handled = await dispatch(message, endpoint, signal)
    if (!handled) {
      logger.warn({ source, tag: message.tag }, 'Unhandled message type')
      return 'unhandled'
    }

    logger.debug({ source, tag: message.tag }, 'Message dispatched')
    return 'dispatched'
  }

  async function route(data: Buffer, endpoint: Endpoint, signal?: AbortSignal): Promise<RouteOutcome> {
    try {
      return await runPipeline(data, endpoint, signal ?? new AbortController().signal)
    } catch (err) {
      logger.error({ err, source: formatEndpoint(endpoint) }, 'Error processing message')
      return 'failed'
    }
  }

  return {
    route,

    async process(data: Buffer, endpoint: Endpoint, signal?: AbortSignal): Promise<void> {
      await route(data, endpoint, signal)
    },

    registry,
    validators,
  }
}
