/**
 * In-memory MessageStore
 *
 * Keeps messages per topic in insertion order. Ownership rules:
 * - only the author edits or deletes a message
 * - only the reacting user removes a reaction
 * - a user reacts with a given emoji at most once per message
 */

import type { Message, Thread } from '../types/index.js'
import type {
  MessageCreatedEvent,
  MessageEditedEvent,
  MessageDeletedEvent,
  ReactionAddedEvent,
  ReactionRemovedEvent,
  ThreadReplyCreatedEvent,
  MessageReadEvent,
} from '../types/index.js'
import {
  ok,
  fail,
  type CreateMessageInput,
  type CreateThreadReplyInput,
  type EditMessageInput,
  type MessageRef,
  type MessageStore,
  type ReactionInput,
  type StoreResult,
} from './types.js'

export interface MemoryMessageStoreOptions {
  /** Clock for createdAt / editedAt (default: Date.now) */
  now?: () => number
}

export interface MemoryMessageStore extends MessageStore {
  /** Every stored message of a topic, oldest first, thread replies included */
  all(topic: string): Message[]

  /** Last message each user marked read in a topic */
  readMarks(topic: string): Record<string, string>
}

export function createMemoryMessageStore(
  options: MemoryMessageStoreOptions = {}
): MemoryMessageStore {
  const now = options.now ?? Date.now

  /** topic → messages, oldest first */
  const topics = new Map<string, Message[]>()

  /** message id → message */
  const byId = new Map<string, Message>()

  /** topic → userId → last read message id */
  const reads = new Map<string, Map<string, string>>()

  let counter = 0

  function nextId(): string {
    counter++
    return `msg-${String(counter).padStart(6, '0')}`
  }

  function timeline(topic: string): Message[] {
    let messages = topics.get(topic)
    if (!messages) {
      messages = []
      topics.set(topic, messages)
    }
    return messages
  }

  function find(topic: string, messageId: string): Message | undefined {
    const message = byId.get(messageId)
    return message && message.topic === topic ? message : undefined
  }

  /** Top-level messages only; thread replies are reached through getThread */
  function channelTimeline(topic: string): Message[] {
    return timeline(topic).filter((message) => message.threadId === null)
  }

  function insert(input: CreateMessageInput, threadId: string | null): Message {
    const message: Message = {
      id: nextId(),
      topic: input.topic,
      authorId: input.authorId,
      content: input.content,
      attachments: [...input.attachments],
      threadId,
      reactions: [],
      createdAt: now(),
      editedAt: null,
    }
    timeline(input.topic).push(message)
    byId.set(message.id, message)
    return message
  }

  function copy(message: Message): Message {
    return {
      ...message,
      attachments: [...message.attachments],
      reactions: [...message.reactions],
    }
  }

  return {
    async createMessage(input: CreateMessageInput): Promise<StoreResult<MessageCreatedEvent>> {
      const message = insert(input, null)
      return ok({ type: 'message_created', message: copy(message), origin: input.authorId })
    },

    async editMessage(input: EditMessageInput): Promise<StoreResult<MessageEditedEvent>> {
      const message = find(input.topic, input.messageId)
      if (!message) return fail('not_found')
      if (message.authorId !== input.userId) return fail('unauthorized')

      message.content = input.content
      message.editedAt = now()
      return ok({ type: 'message_edited', message: copy(message), origin: input.userId })
    },

    async deleteMessage(input: MessageRef): Promise<StoreResult<MessageDeletedEvent>> {
      const message = find(input.topic, input.messageId)
      if (!message) return fail('not_found')
      if (message.authorId !== input.userId) return fail('unauthorized')

      const messages = timeline(input.topic)
      messages.splice(messages.indexOf(message), 1)
      byId.delete(message.id)
      return ok({ type: 'message_deleted', message: copy(message), origin: input.userId })
    },

    async addReaction(input: ReactionInput): Promise<StoreResult<ReactionAddedEvent>> {
      const message = find(input.topic, input.messageId)
      if (!message) return fail('not_found')

      const exists = message.reactions.some(
        (reaction) => reaction.emoji === input.emoji && reaction.userId === input.userId
      )
      if (exists) return fail('already_reacted')

      message.reactions.push({ emoji: input.emoji, userId: input.userId })
      return ok({
        type: 'reaction_added',
        messageId: message.id,
        emoji: input.emoji,
        identity: input.userId,
        origin: input.userId,
      })
    },

    async removeReaction(input: ReactionInput): Promise<StoreResult<ReactionRemovedEvent>> {
      const message = find(input.topic, input.messageId)
      if (!message) return fail('not_found')

      const index = message.reactions.findIndex(
        (reaction) => reaction.emoji === input.emoji && reaction.userId === input.userId
      )
      if (index === -1) return fail('not_found')

      message.reactions.splice(index, 1)
      return ok({
        type: 'reaction_removed',
        messageId: message.id,
        emoji: input.emoji,
        identity: input.userId,
        origin: input.userId,
      })
    },

    async createThreadReply(
      input: CreateThreadReplyInput
    ): Promise<StoreResult<ThreadReplyCreatedEvent>> {
      const parent = find(input.topic, input.threadId)
      if (!parent) return fail('not_found')
      // Replies hang off the thread root, never off another reply
      const rootId = parent.threadId ?? parent.id

      const reply = insert(input, rootId)
      return ok({ type: 'thread_reply_created', message: copy(reply), origin: input.authorId })
    },

    async markRead(input: MessageRef): Promise<StoreResult<MessageReadEvent>> {
      if (!find(input.topic, input.messageId)) return fail('not_found')

      let marks = reads.get(input.topic)
      if (!marks) {
        marks = new Map()
        reads.set(input.topic, marks)
      }
      marks.set(input.userId, input.messageId)
      return ok({
        type: 'message_read',
        messageId: input.messageId,
        identity: input.userId,
        origin: input.userId,
      })
    },

    async getThread(input: MessageRef): Promise<StoreResult<Thread>> {
      const message = find(input.topic, input.messageId)
      if (!message) return fail('not_found')

      const replies = timeline(input.topic)
        .filter((candidate) => candidate.threadId === message.id)
        .map(copy)
      return ok({ message: copy(message), replies })
    },

    async listRecent(topic: string, limit: number): Promise<StoreResult<Message[]>> {
      const messages = channelTimeline(topic)
      return ok(messages.slice(Math.max(0, messages.length - limit)).map(copy))
    },

    async listBefore(
      topic: string,
      beforeId: string,
      limit: number
    ): Promise<StoreResult<Message[]>> {
      const messages = channelTimeline(topic)
      const index = messages.findIndex((message) => message.id === beforeId)
      if (index === -1) return fail('not_found')

      return ok(messages.slice(Math.max(0, index - limit), index).map(copy))
    },

    all(topic: string): Message[] {
      return timeline(topic).map(copy)
    },

    readMarks(topic: string): Record<string, string> {
      return Object.fromEntries(reads.get(topic) ?? new Map<string, string>())
    },
  }
}
