/**
 * Error Module
 *
 * Gateway error class, error factories and error code definitions.
 */

export { Errors } from './factories.js'
export type { ConfigIssue } from './factories.js'

export { ErrorCodes, type ErrorCode, type ErrorCodeDef, getErrorCode } from './codes.js'

export { GatewayError } from './gateway-error.js'
