export type { Identity } from './identity.js'

export type { Topic, TopicKind } from './topic.js'
export { parseTopic, formatTopic, workspaceTopic } from './topic.js'

export type { Attachment, Reaction, Message, Thread } from './message.js'

export type {
  PresenceStatus,
  PresenceMeta,
  PresenceMap,
  PresenceDiff,
  MessageCreatedEvent,
  MessageEditedEvent,
  MessageDeletedEvent,
  ReactionAddedEvent,
  ReactionRemovedEvent,
  ThreadReplyCreatedEvent,
  MessageReadEvent,
  TypingStartedEvent,
  TypingStoppedEvent,
  PresenceDiffedEvent,
  DomainEvent,
  EventType,
  TopicEvent,
} from './events.js'
export { PRESENCE_STATUSES, isTypingEvent } from './events.js'
