/**
 * Error Factories Tests
 */

import { describe, it, expect } from 'vitest'
import { Errors } from './factories.js'
import { ErrorCodes, getErrorCode } from './codes.js'
import { GatewayError } from './gateway-error.js'

describe('ErrorCodes', () => {
  it('should have consistent code and key', () => {
    for (const [key, def] of Object.entries(ErrorCodes)) {
      expect(def.code).toBe(key)
    }
  })

  it('should look up definitions by code', () => {
    expect(getErrorCode('INVALID_STATE')?.message).toBe('Invalid state for operation')
    expect(getErrorCode('NOT_A_CODE')).toBeUndefined()
  })
})

describe('Errors', () => {
  it('invalidConfig should join every issue', () => {
    const error = Errors.invalidConfig([
      { field: 'port', message: 'Port number must be between 1 and 65535' },
      { field: 'address', message: 'Invalid IP address' },
    ])

    expect(error).toBeInstanceOf(GatewayError)
    expect(error.code).toBe('INVALID_CONFIG')
    expect(error.message).toBe(
      'port: Port number must be between 1 and 65535; address: Invalid IP address'
    )
  })

  it('invalidConfig should fall back to the default message', () => {
    expect(Errors.invalidConfig([]).message).toBe('Invalid configuration')
  })

  it('invalidState should keep the caller message', () => {
    const error = Errors.invalidState('The server is not running.')
    expect(error.code).toBe('INVALID_STATE')
    expect(error.message).toBe('The server is not running.')
    expect(error.name).toBe('GatewayError')
  })

  it('invalidArgument should carry details', () => {
    const error = Errors.invalidArgument('cidr', 'not a CIDR range', '10.0.0.0/99')
    expect(error.message).toBe('cidr: not a CIDR range')
    expect(error.toJSON()).toEqual({
      code: 'INVALID_ARGUMENT',
      message: 'cidr: not a CIDR range',
      details: { field: 'cidr', reason: 'not a CIDR range', value: '10.0.0.0/99' },
    })
  })

  it('bufferReleased should use the default message', () => {
    const error = Errors.bufferReleased()
    expect(error.code).toBe('BUFFER_RELEASED')
    expect(error.toJSON()).toEqual({
      code: 'BUFFER_RELEASED',
      message: 'Buffer has already been released',
    })
  })
})
