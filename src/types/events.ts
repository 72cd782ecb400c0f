/**
 * Event Types
 *
 * Domain events flowing through a topic. A collaborator or a topic-owned
 * component produces a `DomainEvent`; the broadcaster stamps it with the
 * topic's next sequence number, freezes it and fans it out as a
 * `TopicEvent`.
 */

import type { Message } from './message.js'

// ─────────────────────────────────────────────────────────────────────────────
// Presence
// ─────────────────────────────────────────────────────────────────────────────

export type PresenceStatus = 'online' | 'away' | 'busy' | 'do_not_disturb' | 'offline'

export const PRESENCE_STATUSES: readonly PresenceStatus[] = [
  'online',
  'away',
  'busy',
  'do_not_disturb',
  'offline',
]

/**
 * One device's presence record for an identity within a topic
 */
export interface PresenceMeta {
  /** Unique per tracked meta; a status change produces a new ref */
  ref: string
  deviceId: string
  status: PresenceStatus
  /** ms since epoch */
  joinedAt: number
  name?: string
}

/**
 * identity → metas
 */
export type PresenceMap = Record<string, PresenceMeta[]>

export interface PresenceDiff {
  joins: PresenceMap
  leaves: PresenceMap
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain events
// ─────────────────────────────────────────────────────────────────────────────

interface EventBase {
  /** userId whose action produced the event, null for system events */
  origin: string | null
}

export interface MessageCreatedEvent extends EventBase {
  type: 'message_created'
  message: Message
}

export interface MessageEditedEvent extends EventBase {
  type: 'message_edited'
  message: Message
}

export interface MessageDeletedEvent extends EventBase {
  type: 'message_deleted'
  message: Message
}

export interface ReactionAddedEvent extends EventBase {
  type: 'reaction_added'
  messageId: string
  emoji: string
  identity: string
}

export interface ReactionRemovedEvent extends EventBase {
  type: 'reaction_removed'
  messageId: string
  emoji: string
  identity: string
}

export interface ThreadReplyCreatedEvent extends EventBase {
  type: 'thread_reply_created'
  message: Message
}

export interface MessageReadEvent extends EventBase {
  type: 'message_read'
  messageId: string
  identity: string
}

export interface TypingStartedEvent extends EventBase {
  type: 'typing_started'
  identity: string
}

export interface TypingStoppedEvent extends EventBase {
  type: 'typing_stopped'
  identity: string
}

export interface PresenceDiffedEvent extends EventBase, PresenceDiff {
  type: 'presence_diff'
}

export type DomainEvent =
  | MessageCreatedEvent
  | MessageEditedEvent
  | MessageDeletedEvent
  | ReactionAddedEvent
  | ReactionRemovedEvent
  | ThreadReplyCreatedEvent
  | MessageReadEvent
  | TypingStartedEvent
  | TypingStoppedEvent
  | PresenceDiffedEvent

export type EventType = DomainEvent['type']

/**
 * A published event: immutable, numbered within its topic
 */
export type TopicEvent = Readonly<DomainEvent & { seq: number; topic: string }>

/**
 * Typing events are the only ones hidden from their originator
 */
export function isTypingEvent(
  event: Pick<DomainEvent, 'type'>
): event is TypingStartedEvent | TypingStoppedEvent {
  return event.type === 'typing_started' || event.type === 'typing_stopped'
}
