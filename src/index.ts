/**
 * Chatwire - Real-time topic layer for team chat
 *
 * Sessions, presence, typing indicators and ordered broadcast over WebSocket.
 */

// === Server ===
export { createRealtimeServer, CLOSE_UNAUTHENTICATED, createConnectionHandler } from './server/index.js'
export type {
  RealtimeServer,
  RealtimeServerOptions,
  ConnectionHandler,
  ConnectionHandlerOptions,
} from './server/index.js'

// === Session ===
export { createSession, createOutboundQueue } from './session/index.js'
export type {
  Session,
  SessionOptions,
  SessionConfig,
  SessionState,
  TerminationReason,
  Connection,
  OutboundQueue,
} from './session/index.js'

// === Topics ===
export { createTopicOwner, createTopicRegistry } from './topics/index.js'
export type {
  TopicOwner,
  TopicOwnerOptions,
  TopicMember,
  TopicState,
  JoinSnapshot,
  TopicRegistry,
  TopicRegistryOptions,
} from './topics/index.js'

// === Broadcast / Presence / Typing ===
export { createTopicBroadcaster } from './broadcast/index.js'
export type { TopicBroadcaster, Subscriber, Subscription } from './broadcast/index.js'

export {
  createPresenceTracker,
  applyPresenceDiff,
  emptyDiff,
  isEmptyDiff,
  clonePresence,
} from './presence/index.js'
export type { PresenceTracker, PresenceTrackerOptions, TrackOptions } from './presence/index.js'

export { createTypingCoordinator, DEFAULT_TYPING_TIMEOUT_MS } from './typing/index.js'
export type { TypingCoordinator, TypingCoordinatorOptions } from './typing/index.js'

// === Authorization ===
export { createAuthorizationGate } from './auth/index.js'
export type {
  AuthorizationGate,
  AuthorizationGateOptions,
  AuthorizationDecision,
  DenyReason,
} from './auth/index.js'

// === Store ===
export { ok, fail, createMemoryMessageStore, createMemoryDirectory } from './store/index.js'
export type {
  StoreResult,
  MessageStore,
  ChannelDirectory,
  ChannelVisibility,
  CreateMessageInput,
  CreateThreadReplyInput,
  EditMessageInput,
  MessageRef,
  ReactionInput,
  MemoryMessageStore,
  MemoryMessageStoreOptions,
  MemoryDirectory,
  DirectorySeed,
  WorkspaceSeed,
  ChannelSeed,
} from './store/index.js'

// === Protocol ===
export {
  ClientCommandSchema,
  COMMAND_OPS,
  MAX_CONTENT_LENGTH,
  parseCommand,
  toServerMessage,
  errorMessage,
  encodeServerMessage,
} from './protocol/index.js'
export type {
  ClientCommand,
  ClientRef,
  CommandOf,
  CommandOp,
  ParsedCommand,
  ServerMessage,
  BroadcastMessage,
  JoinedMessage,
  ErrorMessage,
  LeftMessage,
  LeaveReason,
  OlderMessagesLoadedMessage,
  ThreadStartedMessage,
  MessageEventMessage,
  ReactionEventMessage,
  MessageReadMessage,
  TypingEventMessage,
  PresenceDiffMessage,
} from './protocol/index.js'

// === Types ===
export { parseTopic, formatTopic, workspaceTopic, PRESENCE_STATUSES, isTypingEvent } from './types/index.js'
export type {
  Identity,
  Topic,
  TopicKind,
  Attachment,
  Reaction,
  Message,
  Thread,
  PresenceStatus,
  PresenceMeta,
  PresenceMap,
  PresenceDiff,
  DomainEvent,
  EventType,
  TopicEvent,
} from './types/index.js'

// === Errors ===
export { RealtimeError, isRealtimeError, Errors, toRealtimeError, ErrorCodes } from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, ErrorReason } from './errors/index.js'

// === Config ===
export { RealtimeConfigSchema, resolveConfig, loadConfig } from './config/index.js'
export type { RealtimeConfig, RealtimeConfigInput } from './config/index.js'

// === Utils ===
export { createLogger } from './utils/index.js'
export type { Logger } from './utils/index.js'
