export { createLogMessageRouter } from './router.js'
export type { LogMessageRouter, LogMessageRouterOptions } from './router.js'

export { dispatchLogMessage } from './handler.js'
export type { LogMessageHandler } from './handler.js'

export { logMessageDecoders, LOG_MESSAGE_ARRAY_PATHS } from './catalog.js'
export type { LogMessage, LogMessageMap, LogMessageTag, LogMessageDecoders } from './catalog.js'

export { contactInfoHasMinimumContent, defaultLogMessageValidators } from './validators.js'

export {
  appInfoSchema,
  contactInfoSchema,
  contactDeleteSchema,
  spotSchema,
  radioInfoSchema,
  dynamicResultsSchema,
} from './schemas.js'
export type {
  AppInfo,
  ContactInfo,
  ContactReplace,
  ContactDelete,
  LookupInfo,
  Spot,
  RadioInfo,
  DynamicResults,
} from './schemas.js'
