/**
 * Error Factories
 *
 * Pre-built helpers for the error taxonomy of the real-time layer.
 */

import { RealtimeError, isRealtimeError } from './realtime-error.js'
import { getCodeForReason } from './codes.js'

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.notFound('Message', messageId)
 * // Creates: { code: 'NOT_FOUND', status: 404, reason: 'not_found', message: "Message 'm-1' not found" }
 *
 * throw Errors.invalid('content', 'must not be empty')
 * // Creates: { code: 'INVALID', status: 400, reason: 'invalid', message: 'content: must not be empty' }
 * ```
 */
export const Errors = {
  /**
   * Malformed command payload
   * @param field - Field that failed validation
   * @param reason - Why validation failed
   */
  invalid(field: string, reason: string): RealtimeError {
    return new RealtimeError('INVALID', `${field}: ${reason}`, { field, reason })
  },

  /**
   * Join denied or action not permitted
   */
  unauthorized(message?: string): RealtimeError {
    return new RealtimeError('UNAUTHORIZED', message || 'Not authorized')
  },

  /**
   * Channel archived
   */
  archived(topic: string): RealtimeError {
    return new RealtimeError('ARCHIVED', `Topic '${topic}' is archived`, { topic })
  },

  /**
   * Unknown topic, message or reaction
   * @param resource - Name of the resource (e.g., 'Topic', 'Message')
   * @param id - Optional resource identifier
   */
  notFound(resource: string, id?: string): RealtimeError {
    const message = id ? `${resource} '${id}' not found` : `${resource} not found`
    return new RealtimeError('NOT_FOUND', message, { resource, id })
  },

  notJoined(topic: string): RealtimeError {
    return new RealtimeError('NOT_JOINED', `Not joined to '${topic}'`, { topic })
  },

  alreadyJoined(topic: string): RealtimeError {
    return new RealtimeError('ALREADY_JOINED', `Already joined to '${topic}'`, { topic })
  },

  /**
   * Collaborator call failed
   * @param operation - Store operation that failed
   * @param reason - Optional reason reported by the collaborator
   */
  storeFailure(operation: string, reason?: string): RealtimeError {
    const message = reason
      ? `Store operation '${operation}' failed: ${reason}`
      : `Store operation '${operation}' failed`
    return new RealtimeError('STORE_FAILURE', message, { operation, reason })
  },

  /**
   * Collaborator call timed out
   */
  storeTimeout(operation: string, timeoutMs: number): RealtimeError {
    return new RealtimeError(
      'STORE_TIMEOUT',
      `Store operation '${operation}' timed out after ${timeoutMs}ms`,
      { operation, timeoutMs }
    )
  },

  /**
   * Outbound queue overflow
   */
  backpressure(limit: number): RealtimeError {
    return new RealtimeError('BACKPRESSURE', `Outbound queue exceeded ${limit} events`, { limit })
  },

  /**
   * Internal fault
   */
  internal(message?: string, details?: unknown): RealtimeError {
    return new RealtimeError('INTERNAL_ERROR', message || 'An internal error occurred', details)
  },

  /**
   * Map a reason string returned by a collaborator onto the taxonomy.
   * Reasons outside the taxonomy become store failures that keep the
   * collaborator's wording as their wire reason.
   */
  fromReason(operation: string, reason: string): RealtimeError {
    const def = getCodeForReason(reason)
    if (def) {
      return new RealtimeError(def.code, `${operation}: ${def.message}`, { operation })
    }
    return new RealtimeError(
      'STORE_FAILURE',
      `Store operation '${operation}' failed: ${reason}`,
      { operation, reason },
      reason
    )
  },
} as const

/**
 * Normalize anything thrown into a RealtimeError
 */
export function toRealtimeError(err: unknown): RealtimeError {
  if (isRealtimeError(err)) return err
  if (err instanceof Error) {
    return Errors.internal(err.message, { name: err.name })
  }
  return Errors.internal(String(err))
}
