/**
 * Utilities
 */

export { createLogger, type Logger } from './logger.js'
export { sid, prefixedId } from './id.js'
export { createMailbox, type Mailbox } from './mailbox.js'
export { withTimeout } from './timeout.js'
