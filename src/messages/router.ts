/**
 * Log message router: the catalog, its validators and the handler table
 * bound onto the generic message router.
 */

import { createMessageRouter, type MessageRouter } from '../core/router.js'
import type { MessageValidator, PayloadDecoder } from '../core/registry.js'
import type { Logger } from '../utils/logger.js'
import { LOG_MESSAGE_ARRAY_PATHS, logMessageDecoders, type LogMessage } from './catalog.js'
import { dispatchLogMessage, type LogMessageHandler } from './handler.js'
import { defaultLogMessageValidators } from './validators.js'

export interface LogMessageRouterOptions {
  /** Extra or replacement decoders for this router only */
  overrides?: Readonly<Record<string, PayloadDecoder<LogMessage>>>
  /** Validators by tag, merged over the defaults */
  validators?: Readonly<Record<string, MessageValidator<LogMessage>>>
  logger?: Logger
}

export type LogMessageRouter = MessageRouter<LogMessage>

export function createLogMessageRouter(
  handler: LogMessageHandler,
  options: LogMessageRouterOptions = {}
): LogMessageRouter {
  return createMessageRouter<LogMessage>({
    decoders: logMessageDecoders,
    overrides: options.overrides,
    validators: { ...defaultLogMessageValidators, ...options.validators },
    dispatch: (message, endpoint, signal) => dispatchLogMessage(handler, message, endpoint, signal),
    arrayPaths: LOG_MESSAGE_ARRAY_PATHS,
    logger: options.logger,
  })
}
