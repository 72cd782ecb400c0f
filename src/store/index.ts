/**
 * Store Module
 *
 * Collaborator contracts (MessageStore, ChannelDirectory) and their
 * in-memory implementations.
 */

export {
  ok,
  fail,
  type StoreResult,
  type MessageStore,
  type ChannelDirectory,
  type ChannelVisibility,
  type CreateMessageInput,
  type CreateThreadReplyInput,
  type EditMessageInput,
  type MessageRef,
  type ReactionInput,
} from './types.js'

export {
  createMemoryMessageStore,
  type MemoryMessageStore,
  type MemoryMessageStoreOptions,
} from './memory-message-store.js'

export {
  createMemoryDirectory,
  type MemoryDirectory,
  type DirectorySeed,
  type WorkspaceSeed,
  type ChannelSeed,
} from './memory-directory.js'
