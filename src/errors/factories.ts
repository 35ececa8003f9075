/**
 * Error Factories
 *
 * Pre-built error helpers for the failures the gateway surfaces to callers.
 */

import { GatewayError } from './gateway-error.js'
import { ErrorCodes } from './codes.js'

/**
 * One configuration problem, as reported by the settings schema
 */
export interface ConfigIssue {
  field: string
  message: string
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.invalidState('The server is already running.')
 * // Creates: { code: 'INVALID_STATE', message: 'The server is already running.' }
 * ```
 */
export const Errors = {
  /**
   * Configuration rejected before any socket is created
   * @param issues - Every field that failed validation
   */
  invalidConfig(issues: ConfigIssue[]): GatewayError {
    const message = issues.length
      ? issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')
      : ErrorCodes.INVALID_CONFIG.message
    return new GatewayError('INVALID_CONFIG', message, { issues })
  },

  /**
   * Lifecycle operation not allowed in the current state
   */
  invalidState(message?: string): GatewayError {
    return new GatewayError('INVALID_STATE', message || ErrorCodes.INVALID_STATE.message)
  },

  /**
   * Invalid argument
   * @param field - Argument name
   * @param reason - Why it was rejected
   * @param value - Optional offending value
   */
  invalidArgument(field: string, reason: string, value?: unknown): GatewayError {
    return new GatewayError('INVALID_ARGUMENT', `${field}: ${reason}`, { field, reason, value })
  },

  /**
   * Pooled buffer used after release
   */
  bufferReleased(): GatewayError {
    return new GatewayError('BUFFER_RELEASED', ErrorCodes.BUFFER_RELEASED.message)
  },
}
