/**
 * Server Messages
 *
 * Wire shapes pushed to clients. Broadcast events carry the topic's `seq`;
 * replies that only the requesting session sees (joined, error, left,
 * older_messages_loaded, thread_started) do not.
 */

import type { Message, PresenceMap, TopicEvent } from '../types/index.js'
import type { ClientRef, CommandOp } from './commands.js'

interface Frame {
  topic: string
}

export interface JoinedMessage extends Frame {
  event: 'joined'
  snapshot: { presence: PresenceMap; recent_messages: Message[] }
  /** Tail sequence number; later events of this topic carry higher ones */
  seq: number
}

export interface ErrorMessage {
  event: 'error'
  /** Null when the frame's topic could not be read */
  topic: string | null
  op: CommandOp | 'unknown'
  reason: string
  client_ref?: ClientRef
}

/** Why a session ended while its connection stays open */
export type LeaveReason = 'left' | 'backpressure' | 'evicted' | 'fault' | 'shutdown'

export interface LeftMessage extends Frame {
  event: 'left'
  reason: LeaveReason
}

export interface OlderMessagesLoadedMessage extends Frame {
  event: 'older_messages_loaded'
  messages: Message[]
  client_ref?: ClientRef
}

export interface ThreadStartedMessage extends Frame {
  event: 'thread_started'
  message_id: string
  message: Message
  replies: Message[]
  client_ref?: ClientRef
}

interface Sequenced extends Frame {
  seq: number
}

export interface MessageEventMessage extends Sequenced {
  event: 'message_created' | 'message_edited' | 'message_deleted' | 'thread_reply_created'
  message: Message
}

export interface ReactionEventMessage extends Sequenced {
  event: 'reaction_added' | 'reaction_removed'
  message_id: string
  emoji: string
  identity: string
}

export interface MessageReadMessage extends Sequenced {
  event: 'message_read'
  message_id: string
  identity: string
}

export interface TypingEventMessage extends Sequenced {
  event: 'typing_started' | 'typing_stopped'
  identity: string
}

export interface PresenceDiffMessage extends Sequenced {
  event: 'presence_diff'
  joins: PresenceMap
  leaves: PresenceMap
}

export type BroadcastMessage =
  | MessageEventMessage
  | ReactionEventMessage
  | MessageReadMessage
  | TypingEventMessage
  | PresenceDiffMessage

export type ServerMessage =
  | JoinedMessage
  | ErrorMessage
  | LeftMessage
  | OlderMessagesLoadedMessage
  | ThreadStartedMessage
  | BroadcastMessage

/**
 * Map a published topic event onto its wire shape
 */
export function toServerMessage(event: TopicEvent): BroadcastMessage {
  const { topic, seq } = event

  switch (event.type) {
    case 'message_created':
    case 'message_edited':
    case 'message_deleted':
    case 'thread_reply_created':
      return { event: event.type, topic, seq, message: event.message }
    case 'reaction_added':
    case 'reaction_removed':
      return {
        event: event.type,
        topic,
        seq,
        message_id: event.messageId,
        emoji: event.emoji,
        identity: event.identity,
      }
    case 'message_read':
      return { event: event.type, topic, seq, message_id: event.messageId, identity: event.identity }
    case 'typing_started':
    case 'typing_stopped':
      return { event: event.type, topic, seq, identity: event.identity }
    case 'presence_diff':
      return { event: event.type, topic, seq, joins: event.joins, leaves: event.leaves }
  }
}

export function errorMessage(
  topic: string | null,
  op: CommandOp | 'unknown',
  reason: string,
  clientRef?: ClientRef
): ErrorMessage {
  return {
    event: 'error',
    topic,
    op,
    reason,
    ...(clientRef !== undefined && { client_ref: clientRef }),
  }
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message)
}
