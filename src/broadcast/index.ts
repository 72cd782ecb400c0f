/**
 * Broadcast Module
 *
 * Per-topic ordered fan-out with bounded subscriber queues.
 */

export {
  createTopicBroadcaster,
  type TopicBroadcaster,
  type Subscriber,
  type Subscription,
} from './topic-broadcaster.js'
