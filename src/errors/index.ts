/**
 * Error Module
 *
 * Error type, error code table and factories.
 */

export { RealtimeError, isRealtimeError } from './realtime-error.js'
export { Errors, toRealtimeError } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  type ErrorReason,
  isErrorCode,
  getErrorCode,
  getCodeForReason,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'
