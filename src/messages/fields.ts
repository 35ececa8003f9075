/**
 * Field codecs for broadcast payloads.
 *
 * Element text arrives as strings (or '' for empty elements). These
 * helpers coerce it into the shapes handlers consume.
 */

import { z } from 'zod'

const WHOLE_NUMBER = /^[+-]?\d+$/

const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647

const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value
}

function toFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value
  switch (value.trim().toLowerCase()) {
    case '':
      return undefined
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      return value
  }
}

function toUtcDate(value: string, ctx: z.RefinementCtx): Date {
  const match = TIMESTAMP.exec(value.trim())
  if (!match) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp '${value}'` })
    return z.NEVER
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number)
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))

  // Date.UTC rolls 2024-02-31 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp '${value}'` })
    return z.NEVER
  }

  return date
}

/** Element text, '' when absent */
export const text = () => z.string().default('')

function wholeNumber(min: number, max: number, fallback: number) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(WHOLE_NUMBER, { message: 'Expected a whole number' })
      .transform(Number)
      .pipe(z.number().int().min(min).max(max))
      .default(String(fallback))
  )
}

/** 32-bit whole number in decimal digits, `fallback` when absent or blank */
export const integer = (fallback = 0) => wholeNumber(INT32_MIN, INT32_MAX, fallback)

/** Whole number up to the safe integer range (frequencies in Hz), 0 when absent or blank */
export const long = () => wholeNumber(Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER, 0)

/** Decimal number, 0 when absent or blank */
export const decimal = () => z.preprocess(blankToUndefined, z.coerce.number().finite().default(0))

/** true/false/1/0 in any case, false when absent */
export const flag = () => z.preprocess(toFlag, z.boolean().default(false))

/** `yyyy-MM-dd HH:mm:ss` (or with a `T`) read as UTC; null when absent */
export const timestamp = () =>
  z.preprocess(blankToUndefined, z.string().transform(toUtcDate).nullable().default(null))

/**
 * Nested element or attribute group. Empty elements parse to '' and are
 * treated as absent.
 */
export const group = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess((value) => blankToUndefined(value) ?? {}, z.object(shape))
