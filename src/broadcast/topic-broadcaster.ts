/**
 * Topic Broadcaster
 *
 * One ordered event stream per topic. `publish` stamps each event with the
 * topic's next sequence number (1, 2, 3, ...), freezes it, and hands it to
 * every subscriber registered at that moment, in subscription order.
 *
 * Subscribers own bounded outbound queues. A subscriber whose queue is full
 * is dropped on the spot and told so through `onOverflow`; the remaining
 * subscribers of the same publish still receive the event.
 */

import type { DomainEvent, TopicEvent } from '../types/index.js'
import { prefixedId } from '../utils/id.js'

/**
 * Receiving end of a subscription
 */
export interface Subscriber {
  /** Stable identifier, used for logs and lookups */
  readonly id: string

  /**
   * Queue an event for delivery.
   * Must not block; return false when the queue is full.
   */
  enqueue(event: TopicEvent): boolean

  /**
   * Called once, after the publish that overflowed this subscriber has
   * finished fanning out. The subscription is already gone by then.
   */
  onOverflow(subscription: Subscription): void
}

export interface Subscription {
  readonly id: string
  readonly subscriberId: string
  /** Events with seq <= fromSeq are never delivered on this subscription */
  readonly fromSeq: number
  readonly active: boolean
}

export interface TopicBroadcaster {
  readonly topic: string

  /** Last assigned sequence number, 0 before the first publish */
  readonly tail: number

  readonly subscriberCount: number

  /**
   * Publish an event to every current subscriber
   * @returns the sequence number assigned to the event
   */
  publish(event: DomainEvent): number

  /**
   * Register for all future events. History is never replayed.
   * @param fromSeq - defaults to the current tail
   */
  subscribe(subscriber: Subscriber, fromSeq?: number): Subscription

  /** Idempotent; returns true only when a live subscription was removed */
  unsubscribe(subscription: Subscription): boolean

  isSubscribed(subscriberId: string): boolean

  /** Drop every subscription without notifying anyone */
  close(): void
}

interface SubscriptionState {
  id: string
  subscriber: Subscriber
  fromSeq: number
  active: boolean
}

function freeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      freeze(nested)
    }
  }
  return value
}

function stamp(event: DomainEvent, seq: number, topic: string): TopicEvent {
  return freeze({ ...structuredClone(event), seq, topic })
}

/**
 * Create a broadcaster for one topic
 *
 * @example
 * ```typescript
 * const broadcaster = createTopicBroadcaster('channel:general')
 * const subscription = broadcaster.subscribe(session)
 * broadcaster.publish({ type: 'typing_started', identity: 'u1', origin: 'u1' }) // → 1
 * broadcaster.unsubscribe(subscription)
 * ```
 */
export function createTopicBroadcaster(topic: string): TopicBroadcaster {
  /** Insertion-ordered: fan-out follows subscription order */
  const subscriptions = new Map<string, SubscriptionState>()

  let seq = 0

  function view(state: SubscriptionState): Subscription {
    return {
      id: state.id,
      subscriberId: state.subscriber.id,
      fromSeq: state.fromSeq,
      get active() {
        return state.active
      },
    }
  }

  function remove(state: SubscriptionState): boolean {
    if (!state.active) return false
    state.active = false
    subscriptions.delete(state.id)
    return true
  }

  return {
    topic,

    get tail(): number {
      return seq
    },

    get subscriberCount(): number {
      return subscriptions.size
    },

    publish(event: DomainEvent): number {
      seq++
      const published = stamp(event, seq, topic)

      // Subscribers added during fan-out start with the next event
      const targets = Array.from(subscriptions.values())
      const overflowed: SubscriptionState[] = []

      for (const state of targets) {
        if (!state.active || published.seq <= state.fromSeq) continue
        if (!state.subscriber.enqueue(published)) {
          remove(state)
          overflowed.push(state)
        }
      }

      for (const state of overflowed) {
        state.subscriber.onOverflow(view(state))
      }

      return published.seq
    },

    subscribe(subscriber: Subscriber, fromSeq: number = seq): Subscription {
      const state: SubscriptionState = {
        id: prefixedId('sub'),
        subscriber,
        fromSeq,
        active: true,
      }
      subscriptions.set(state.id, state)
      return view(state)
    },

    unsubscribe(subscription: Subscription): boolean {
      const state = subscriptions.get(subscription.id)
      return state ? remove(state) : false
    },

    isSubscribed(subscriberId: string): boolean {
      for (const state of subscriptions.values()) {
        if (state.subscriber.id === subscriberId) return true
      }
      return false
    },

    close(): void {
      for (const state of subscriptions.values()) {
        state.active = false
      }
      subscriptions.clear()
    },
  }
}
