/**
 * Registry - Tag and Validator Registration
 *
 * Maps lower-cased root tags to payload decoders, and payload tags to
 * validators. Both are fixed once built: overrides are accepted at
 * construction only.
 */

import type { XmlElement } from './xml.js'

/**
 * A decoded payload, discriminated by the tag it was decoded under
 */
export interface TaggedMessage {
  readonly tag: string
}

/**
 * Decode the root element's content into a typed message. Throws on
 * content that does not fit the payload shape.
 */
export type PayloadDecoder<TMessage extends TaggedMessage> = (element: XmlElement) => TMessage

/**
 * Semantic check run after decoding
 */
export interface MessageValidator<TMessage extends TaggedMessage> {
  isValid(message: TMessage): boolean
}

/**
 * Tag registry interface
 */
export interface TagRegistry<TMessage extends TaggedMessage> {
  /** Get the decoder for a root tag (case-insensitive) */
  resolve(tag: string): PayloadDecoder<TMessage> | undefined

  /** Check if a tag is registered */
  has(tag: string): boolean

  /** List registered tags */
  tags(): string[]
}

/**
 * Validator registry interface. Tags without a validator are always valid.
 */
export interface ValidatorRegistry<TMessage extends TaggedMessage> {
  /** Get the validator for a payload tag */
  get(tag: string): MessageValidator<TMessage> | undefined

  /** Run the validator registered for the message's tag, if any */
  isValid(message: TMessage): boolean
}

function lowerCaseEntries<T>(record: Readonly<Record<string, T>>): Array<[string, T]> {
  return Object.entries(record).map(([key, value]) => [key.toLowerCase(), value])
}

/**
 * Create a tag registry. `overrides` add tags or replace decoders for this
 * instance only.
 */
export function createTagRegistry<TMessage extends TaggedMessage>(
  decoders: Readonly<Record<string, PayloadDecoder<TMessage>>>,
  overrides: Readonly<Record<string, PayloadDecoder<TMessage>>> = {}
): TagRegistry<TMessage> {
  const entries: ReadonlyMap<string, PayloadDecoder<TMessage>> = new Map([
    ...lowerCaseEntries(decoders),
    ...lowerCaseEntries(overrides),
  ])

  return {
    resolve(tag: string): PayloadDecoder<TMessage> | undefined {
      return entries.get(tag.toLowerCase())
    },

    has(tag: string): boolean {
      return entries.has(tag.toLowerCase())
    },

    tags(): string[] {
      return Array.from(entries.keys())
    },
  }
}

/**
 * Create a validator registry keyed by payload tag
 */
export function createValidatorRegistry<TMessage extends TaggedMessage>(
  validators: Readonly<Record<string, MessageValidator<TMessage>>> = {}
): ValidatorRegistry<TMessage> {
  const entries: ReadonlyMap<string, MessageValidator<TMessage>> = new Map(lowerCaseEntries(validators))

  return {
    get(tag: string): MessageValidator<TMessage> | undefined {
      return entries.get(tag.toLowerCase())
    },

    isValid(message: TMessage): boolean {
      const validator = entries.get(message.tag.toLowerCase())
      return validator ? validator.isValid(message) : true
    },
  }
}
