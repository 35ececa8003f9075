import type { ErrorCode } from './codes.js'

/**
 * Gateway error - thrown for configuration and lifecycle failures
 */
export class GatewayError extends Error {
  constructor(
    /** String error code (e.g., 'INVALID_CONFIG', 'INVALID_STATE') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message)
    this.name = 'GatewayError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}
