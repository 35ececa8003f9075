/**
 * Message catalog: root tag -> payload decoder.
 */

import type { PayloadDecoder } from '../core/registry.js'
import {
  appInfoSchema,
  contactDeleteSchema,
  contactInfoSchema,
  dynamicResultsSchema,
  radioInfoSchema,
  spotSchema,
  type AppInfo,
  type ContactDelete,
  type ContactInfo,
  type ContactReplace,
  type DynamicResults,
  type LookupInfo,
  type RadioInfo,
  type Spot,
} from './schemas.js'

export { DYNAMIC_RESULTS_ARRAY_PATHS as LOG_MESSAGE_ARRAY_PATHS } from './schemas.js'

/**
 * Payload type for each tag
 */
export type LogMessageMap = {
  appinfo: AppInfo
  contactinfo: ContactInfo
  contactreplace: ContactReplace
  contactdelete: ContactDelete
  lookupinfo: LookupInfo
  spot: Spot
  dynamicresults: DynamicResults
  radioinfo: RadioInfo
}

export type LogMessageTag = keyof LogMessageMap

/**
 * A decoded message. `LogMessage` alone is the union of every tag.
 */
export type LogMessage<K extends LogMessageTag = LogMessageTag> = {
  [P in K]: { readonly tag: P; readonly payload: LogMessageMap[P] }
}[K]

export type LogMessageDecoders = { [K in LogMessageTag]: PayloadDecoder<LogMessage<K>> }

export const logMessageDecoders: LogMessageDecoders = {
  appinfo: (element) => ({ tag: 'appinfo', payload: appInfoSchema.parse(element) }),
  contactinfo: (element) => ({ tag: 'contactinfo', payload: contactInfoSchema.parse(element) }),
  contactreplace: (element) => ({ tag: 'contactreplace', payload: contactInfoSchema.parse(element) }),
  contactdelete: (element) => ({ tag: 'contactdelete', payload: contactDeleteSchema.parse(element) }),
  lookupinfo: (element) => ({ tag: 'lookupinfo', payload: contactInfoSchema.parse(element) }),
  spot: (element) => ({ tag: 'spot', payload: spotSchema.parse(element) }),
  dynamicresults: (element) => ({ tag: 'dynamicresults', payload: dynamicResultsSchema.parse(element) }),
  radioinfo: (element) => ({ tag: 'radioinfo', payload: radioInfoSchema.parse(element) }),
}
