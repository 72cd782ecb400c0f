/**
 * Topics Module
 *
 * Serialized per-topic owners and the registry supervising them.
 */

export {
  createTopicOwner,
  type TopicOwner,
  type TopicOwnerOptions,
  type TopicMember,
  type TopicState,
  type JoinSnapshot,
} from './topic-owner.js'

export {
  createTopicRegistry,
  type TopicRegistry,
  type TopicRegistryOptions,
} from './topic-registry.js'
