/**
 * Protocol Module
 *
 * Client command schemas and server message shapes.
 */

export {
  ClientCommandSchema,
  COMMAND_OPS,
  MAX_CONTENT_LENGTH,
  parseCommand,
  type ClientCommand,
  type ClientRef,
  type CommandOf,
  type CommandOp,
  type ParsedCommand,
} from './commands.js'

export {
  toServerMessage,
  errorMessage,
  encodeServerMessage,
  type ServerMessage,
  type BroadcastMessage,
  type JoinedMessage,
  type ErrorMessage,
  type LeftMessage,
  type LeaveReason,
  type OlderMessagesLoadedMessage,
  type ThreadStartedMessage,
  type MessageEventMessage,
  type ReactionEventMessage,
  type MessageReadMessage,
  type TypingEventMessage,
  type PresenceDiffMessage,
} from './messages.js'
