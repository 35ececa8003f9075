/**
 * Error Codes
 *
 * Central definition of the gateway's error codes. Only configuration
 * and lifecycle problems ever reach a caller; everything on the message
 * path is logged and dropped.
 */

/**
 * Error code definition with string identifier and default message
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'INVALID_STATE') */
  code: string
  /** Default message */
  message: string
}

/**
 * All gateway error codes
 */
export const ErrorCodes = {
  /** Server settings failed validation (address, port, sizes) */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    message: 'Invalid configuration',
  },

  /** Lifecycle misuse: start while running, stop while stopped, use after dispose */
  INVALID_STATE: {
    code: 'INVALID_STATE',
    message: 'Invalid state for operation',
  },

  /** Invalid argument provided */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    message: 'Invalid argument',
  },

  /** A pooled buffer was read or released after it went back to the pool */
  BUFFER_RELEASED: {
    code: 'BUFFER_RELEASED',
    message: 'Buffer has already been released',
  },
} as const satisfies Record<string, ErrorCodeDef>

export type ErrorCode = keyof typeof ErrorCodes

/**
 * Get error code definition by code string
 */
export function getErrorCode(code: string): ErrorCodeDef | undefined {
  return Object.values(ErrorCodes).find((def) => def.code === code)
}
