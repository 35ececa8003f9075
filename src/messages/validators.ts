import type { MessageValidator } from '../core/registry.js'
import type { LogMessage } from './catalog.js'

function isBlank(value: string): boolean {
  return value.trim() === ''
}

/**
 * A contact needs a callsign, a station or operator, a time and a mode
 * before anything downstream can log it.
 */
export const contactInfoHasMinimumContent: MessageValidator<LogMessage> = {
  isValid(message) {
    if (message.tag !== 'contactinfo') return true
    const contact = message.payload
    return (
      !isBlank(contact.call) &&
      (!isBlank(contact.StationName) || !isBlank(contact.operator)) &&
      contact.timestamp !== null &&
      !isBlank(contact.mode)
    )
  },
}

export const defaultLogMessageValidators: Readonly<Record<string, MessageValidator<LogMessage>>> = {
  contactinfo: contactInfoHasMinimumContent,
}
