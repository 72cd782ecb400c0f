/**
 * Session Module
 */

export {
  createSession,
  type Session,
  type SessionOptions,
  type SessionConfig,
  type SessionState,
  type TerminationReason,
  type Connection,
} from './session.js'

export { createOutboundQueue, type OutboundQueue } from './outbound-queue.js'
