/**
 * RealtimeError
 *
 * The single error type raised across the real-time layer. Carries the
 * string code, the HTTP-like status and the wire reason that clients see.
 */

import { getErrorCode } from './codes.js'

export class RealtimeError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Client errors
   * - 500-599: Server errors
   */
  public readonly status: number

  /** Short reason string pushed to clients */
  public readonly reason: string

  constructor(
    /** String error code (e.g., 'NOT_FOUND', 'INVALID') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit reason override */
    reason?: string
  ) {
    super(message)
    this.name = 'RealtimeError'
    const def = getErrorCode(code)
    this.status = def.status
    this.reason = reason ?? def.reason
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; reason: string; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      reason: this.reason,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

export function isRealtimeError(err: unknown): err is RealtimeError {
  return err instanceof RealtimeError
}
