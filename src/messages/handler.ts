/**
 * Handler capability and the fixed tag -> operation table.
 */

import type { Endpoint } from '../types/endpoint.js'
import type {
  AppInfo,
  ContactDelete,
  ContactInfo,
  ContactReplace,
  DynamicResults,
  LookupInfo,
  RadioInfo,
  Spot,
} from './schemas.js'
import type { LogMessage, LogMessageMap, LogMessageTag } from './catalog.js'

/**
 * Receives decoded and validated messages. Implementations own what
 * happens to a message and should honour `signal`.
 */
export interface LogMessageHandler {
  handleAppInfo(message: AppInfo, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleContactInfo(message: ContactInfo, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleContactReplace(message: ContactReplace, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleContactDelete(message: ContactDelete, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleLookupInfo(message: LookupInfo, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleSpot(message: Spot, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleDynamicResults(message: DynamicResults, endpoint: Endpoint, signal: AbortSignal): Promise<void>
  handleRadioInfo(message: RadioInfo, endpoint: Endpoint, signal: AbortSignal): Promise<void>
}

type HandlerOperations = {
  [K in LogMessageTag]: (
    handler: LogMessageHandler,
    payload: LogMessageMap[K],
    endpoint: Endpoint,
    signal: AbortSignal
  ) => Promise<void>
}

const handlerOperations: HandlerOperations = {
  appinfo: (handler, payload, endpoint, signal) => handler.handleAppInfo(payload, endpoint, signal),
  contactinfo: (handler, payload, endpoint, signal) => handler.handleContactInfo(payload, endpoint, signal),
  contactreplace: (handler, payload, endpoint, signal) => handler.handleContactReplace(payload, endpoint, signal),
  contactdelete: (handler, payload, endpoint, signal) => handler.handleContactDelete(payload, endpoint, signal),
  lookupinfo: (handler, payload, endpoint, signal) => handler.handleLookupInfo(payload, endpoint, signal),
  spot: (handler, payload, endpoint, signal) => handler.handleSpot(payload, endpoint, signal),
  dynamicresults: (handler, payload, endpoint, signal) => handler.handleDynamicResults(payload, endpoint, signal),
  radioinfo: (handler, payload, endpoint, signal) => handler.handleRadioInfo(payload, endpoint, signal),
}

function invoke<K extends LogMessageTag>(
  handler: LogMessageHandler,
  message: LogMessage<K>,
  endpoint: Endpoint,
  signal: AbortSignal
): Promise<void> {
  const operation: HandlerOperations[K] = handlerOperations[message.tag]
  return operation(handler, message.payload, endpoint, signal)
}

/**
 * Deliver a message to the handler operation for its tag. Resolves false
 * when the tag has no operation.
 */
export async function dispatchLogMessage(
  handler: LogMessageHandler,
  message: LogMessage,
  endpoint: Endpoint,
  signal: AbortSignal
): Promise<boolean> {
  if (!Object.hasOwn(handlerOperations, message.tag)) return false
  await invoke(handler, message, endpoint, signal)
  return true
}
