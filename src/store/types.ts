/**
 * Collaborator Interfaces
 *
 * The real-time layer does not persist anything. Messages, reactions,
 * threads and memberships live behind these two interfaces; the core
 * only relays commands to them and broadcasts what they return.
 */

import type { Attachment, Message, Thread, Topic } from '../types/index.js'
import type {
  MessageCreatedEvent,
  MessageEditedEvent,
  MessageDeletedEvent,
  ReactionAddedEvent,
  ReactionRemovedEvent,
  ThreadReplyCreatedEvent,
  MessageReadEvent,
} from '../types/index.js'

/**
 * Outcome of a collaborator call. `reason` is a wire reason such as
 * `not_found` or `unauthorized`; unknown reasons surface as store failures.
 */
export type StoreResult<T> = { ok: true; value: T } | { ok: false; reason: string }

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value }
}

export function fail<T = never>(reason: string): StoreResult<T> {
  return { ok: false, reason }
}

// ─────────────────────────────────────────────────────────────────────────────
// MessageStore
// ─────────────────────────────────────────────────────────────────────────────

export interface CreateMessageInput {
  topic: string
  authorId: string
  content: string
  attachments: Attachment[]
}

export interface CreateThreadReplyInput extends CreateMessageInput {
  threadId: string
}

export interface EditMessageInput {
  topic: string
  messageId: string
  userId: string
  content: string
}

export interface MessageRef {
  topic: string
  messageId: string
  userId: string
}

export interface ReactionInput extends MessageRef {
  emoji: string
}

export interface MessageStore {
  createMessage(input: CreateMessageInput): Promise<StoreResult<MessageCreatedEvent>>
  editMessage(input: EditMessageInput): Promise<StoreResult<MessageEditedEvent>>
  deleteMessage(input: MessageRef): Promise<StoreResult<MessageDeletedEvent>>
  addReaction(input: ReactionInput): Promise<StoreResult<ReactionAddedEvent>>
  removeReaction(input: ReactionInput): Promise<StoreResult<ReactionRemovedEvent>>
  createThreadReply(input: CreateThreadReplyInput): Promise<StoreResult<ThreadReplyCreatedEvent>>
  markRead(input: MessageRef): Promise<StoreResult<MessageReadEvent>>
  getThread(input: MessageRef): Promise<StoreResult<Thread>>
  /** Newest `limit` messages, oldest first */
  listRecent(topic: string, limit: number): Promise<StoreResult<Message[]>>
  /** Up to `limit` messages older than `beforeId`, oldest first */
  listBefore(topic: string, beforeId: string, limit: number): Promise<StoreResult<Message[]>>
}

// ─────────────────────────────────────────────────────────────────────────────
// ChannelDirectory
// ─────────────────────────────────────────────────────────────────────────────

export type ChannelVisibility = 'public' | 'private'

export interface ChannelDirectory {
  /**
   * Workspace a topic belongs to (its own id for workspace topics),
   * or null when the topic does not exist
   */
  workspaceOf(topic: Topic): Promise<string | null>

  /**
   * Workspace topic → active workspace membership.
   * Channel topic → explicit channel membership.
   */
  isMember(userId: string, topic: Topic): Promise<boolean>

  visibility(topic: Topic): Promise<ChannelVisibility>

  isArchived(topic: Topic): Promise<boolean>

  isAdmin(userId: string, workspaceId: string): Promise<boolean>
}
