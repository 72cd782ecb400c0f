/**
 * Error Codes
 *
 * Central definition of every error the real-time layer can surface.
 * Each code pairs an internal identifier with an HTTP-like status and the
 * short `reason` string that travels to clients inside `error` events.
 *
 * Status Code Ranges:
 * - 400-499: Client errors (bad command, authorization, slow consumer)
 * - 500-599: Server errors (collaborator failures, internal faults)
 */

/**
 * Error code definition
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Wire reason pushed to clients (e.g., 'not_found') */
  reason: string
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Client Errors
  // ─────────────────────────────────────────────────────────────

  /** Malformed command payload or missing required field */
  INVALID: {
    code: 'INVALID',
    status: 400,
    reason: 'invalid',
    message: 'Invalid command',
  },

  /** Join denied, or action on an entity the caller does not own */
  UNAUTHORIZED: {
    code: 'UNAUTHORIZED',
    status: 403,
    reason: 'unauthorized',
    message: 'Unauthorized',
  },

  /** Channel is archived and the caller is not a workspace admin */
  ARCHIVED: {
    code: 'ARCHIVED',
    status: 403,
    reason: 'archived',
    message: 'Channel is archived',
  },

  /** Unknown topic, message or reaction */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    reason: 'not_found',
    message: 'Not found',
  },

  /** Command addressed to a topic the connection has not joined */
  NOT_JOINED: {
    code: 'NOT_JOINED',
    status: 409,
    reason: 'not_joined',
    message: 'Not joined to topic',
  },

  /** Second join for a topic the connection already holds */
  ALREADY_JOINED: {
    code: 'ALREADY_JOINED',
    status: 409,
    reason: 'already_joined',
    message: 'Already joined to topic',
  },

  /** Session outbound queue overflowed */
  BACKPRESSURE: {
    code: 'BACKPRESSURE',
    status: 429,
    reason: 'backpressure',
    message: 'Outbound queue overflow',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Server Errors
  // ─────────────────────────────────────────────────────────────

  /** Internal fault */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    reason: 'internal',
    message: 'Internal error',
  },

  /** A collaborator call failed */
  STORE_FAILURE: {
    code: 'STORE_FAILURE',
    status: 502,
    reason: 'store_failure',
    message: 'Store call failed',
  },

  /** A collaborator call did not answer in time */
  STORE_TIMEOUT: {
    code: 'STORE_TIMEOUT',
    status: 504,
    reason: 'store_timeout',
    message: 'Store call timed out',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Wire reason type (string union)
 */
export type ErrorReason = (typeof ErrorCodes)[ErrorCode]['reason']

export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  // Unrecognized codes are reported as internal faults
  return {
    code,
    status: 500,
    reason: ErrorCodes.INTERNAL_ERROR.reason,
    message: code,
  }
}

/**
 * Find the code definition that owns a wire reason
 */
export function getCodeForReason(reason: string): ErrorCodeDef | undefined {
  return Object.values(ErrorCodes).find((def) => def.reason === reason)
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}

/**
 * Check if status code is a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600
}
