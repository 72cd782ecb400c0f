/**
 * Error Factories Tests
 */

import { describe, it, expect } from 'vitest'
import { Errors, toRealtimeError } from './factories.js'
import {
  ErrorCodes,
  getErrorCode,
  getCodeForReason,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'
import { RealtimeError } from './realtime-error.js'

describe('ErrorCodes', () => {
  it('should have consistent code and key', () => {
    for (const [key, def] of Object.entries(ErrorCodes)) {
      expect(def.code).toBe(key)
    }
  })

  it('should use unique wire reasons', () => {
    const reasons = Object.values(ErrorCodes).map((def) => def.reason)
    expect(new Set(reasons).size).toBe(reasons.length)
  })
})

describe('getErrorCode', () => {
  it('should return code definition for known codes', () => {
    const def = getErrorCode('BACKPRESSURE')
    expect(def.status).toBe(429)
    expect(def.reason).toBe('backpressure')
  })

  it('should treat unrecognized codes as internal', () => {
    const def = getErrorCode('SOMETHING_ELSE')
    expect(def.code).toBe('SOMETHING_ELSE')
    expect(def.status).toBe(500)
    expect(def.reason).toBe('internal')
  })
})

describe('getCodeForReason', () => {
  it('should find the owning code of a reason', () => {
    expect(getCodeForReason('store_timeout')?.code).toBe('STORE_TIMEOUT')
    expect(getCodeForReason('not_found')?.code).toBe('NOT_FOUND')
  })

  it('should return undefined for unknown reasons', () => {
    expect(getCodeForReason('exploded')).toBeUndefined()
  })
})

describe('status helpers', () => {
  it('should classify statuses', () => {
    expect(getStatusForCode('INVALID')).toBe(400)
    expect(isClientError(getStatusForCode('UNAUTHORIZED'))).toBe(true)
    expect(isServerError(getStatusForCode('STORE_FAILURE'))).toBe(true)
    expect(isClientError(500)).toBe(false)
    expect(isServerError(404)).toBe(false)
  })
})

describe('Errors', () => {
  it('should create invalid errors with field details', () => {
    const error = Errors.invalid('content', 'must not be empty')

    expect(error).toBeInstanceOf(RealtimeError)
    expect(error.code).toBe('INVALID')
    expect(error.reason).toBe('invalid')
    expect(error.message).toBe('content: must not be empty')
    expect(error.details).toEqual({ field: 'content', reason: 'must not be empty' })
  })

  it('should create not found errors with and without id', () => {
    expect(Errors.notFound('Message', 'm-1').message).toBe("Message 'm-1' not found")
    expect(Errors.notFound('Topic').message).toBe('Topic not found')
  })

  it('should create store timeout errors', () => {
    const error = Errors.storeTimeout('createMessage', 250)

    expect(error.reason).toBe('store_timeout')
    expect(error.status).toBe(504)
    expect(error.message).toBe("Store operation 'createMessage' timed out after 250ms")
  })

  it('should map known collaborator reasons onto the taxonomy', () => {
    const error = Errors.fromReason('editMessage', 'unauthorized')

    expect(error.code).toBe('UNAUTHORIZED')
    expect(error.reason).toBe('unauthorized')
  })

  it('should keep unknown collaborator reasons on the wire', () => {
    const error = Errors.fromReason('createMessage', 'content_too_long')

    expect(error.code).toBe('STORE_FAILURE')
    expect(error.status).toBe(502)
    expect(error.reason).toBe('content_too_long')
  })

  it('should serialize to JSON', () => {
    expect(Errors.backpressure(8).toJSON()).toEqual({
      code: 'BACKPRESSURE',
      status: 429,
      reason: 'backpressure',
      message: 'Outbound queue exceeded 8 events',
      details: { limit: 8 },
    })
  })
})

describe('toRealtimeError', () => {
  it('should pass RealtimeError through', () => {
    const error = Errors.unauthorized()
    expect(toRealtimeError(error)).toBe(error)
  })

  it('should wrap plain errors as internal', () => {
    const error = toRealtimeError(new TypeError('boom'))

    expect(error.code).toBe('INTERNAL_ERROR')
    expect(error.message).toBe('boom')
    expect(error.details).toEqual({ name: 'TypeError' })
  })

  it('should wrap non-error values', () => {
    expect(toRealtimeError('nope').message).toBe('nope')
  })
})
