/**
 * Topic Broadcaster Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { createTopicBroadcaster, type Subscriber, type Subscription } from './topic-broadcaster.js'
import type { DomainEvent, TopicEvent } from '../types/index.js'

interface TestSubscriber extends Subscriber {
  received: TopicEvent[]
  overflows: Subscription[]
}

function createSubscriber(id: string, capacity = Infinity): TestSubscriber {
  const received: TopicEvent[] = []
  const overflows: Subscription[] = []
  return {
    id,
    received,
    overflows,
    enqueue(event) {
      if (received.length >= capacity) return false
      received.push(event)
      return true
    },
    onOverflow(subscription) {
      overflows.push(subscription)
    },
  }
}

function typing(identity: string): DomainEvent {
  return { type: 'typing_started', identity, origin: identity }
}

describe('TopicBroadcaster', () => {
  it('should assign sequence numbers starting at 1', () => {
    const broadcaster = createTopicBroadcaster('channel:general')

    expect(broadcaster.tail).toBe(0)
    expect(broadcaster.publish(typing('u1'))).toBe(1)
    expect(broadcaster.publish(typing('u2'))).toBe(2)
    expect(broadcaster.tail).toBe(2)
  })

  it('should stamp topic and seq on delivered events', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscriber = createSubscriber('s1')
    broadcaster.subscribe(subscriber)

    broadcaster.publish(typing('u1'))

    expect(subscriber.received).toEqual([
      { type: 'typing_started', identity: 'u1', origin: 'u1', seq: 1, topic: 'channel:general' },
    ])
  })

  it('should deliver the same order to every subscriber', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscribers = ['s1', 's2', 's3'].map((id) => createSubscriber(id))
    for (const subscriber of subscribers) broadcaster.subscribe(subscriber)

    for (let i = 0; i < 20; i++) {
      broadcaster.publish(typing(`u${i}`))
    }

    for (const subscriber of subscribers) {
      expect(subscriber.received.map((event) => event.seq)).toEqual(
        Array.from({ length: 20 }, (_, i) => i + 1)
      )
    }
  })

  it('should not replay history to late subscribers', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    broadcaster.publish(typing('u1'))
    broadcaster.publish(typing('u2'))

    const late = createSubscriber('late')
    const subscription = broadcaster.subscribe(late)
    broadcaster.publish(typing('u3'))

    expect(subscription.fromSeq).toBe(2)
    expect(late.received.map((event) => event.seq)).toEqual([3])
  })

  it('should skip events at or below fromSeq', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscriber = createSubscriber('s1')
    broadcaster.subscribe(subscriber, 2)

    broadcaster.publish(typing('u1'))
    broadcaster.publish(typing('u2'))
    broadcaster.publish(typing('u3'))

    expect(subscriber.received.map((event) => event.seq)).toEqual([3])
  })

  it('should unsubscribe idempotently', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscriber = createSubscriber('s1')
    const subscription = broadcaster.subscribe(subscriber)

    expect(broadcaster.unsubscribe(subscription)).toBe(true)
    expect(broadcaster.unsubscribe(subscription)).toBe(false)
    expect(subscription.active).toBe(false)
    expect(broadcaster.subscriberCount).toBe(0)

    broadcaster.publish(typing('u1'))
    expect(subscriber.received).toEqual([])
  })

  it('should freeze published events', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscriber = createSubscriber('s1')
    broadcaster.subscribe(subscriber)
    const source: DomainEvent = {
      type: 'presence_diff',
      joins: { u1: [{ ref: '1', deviceId: 'd1', status: 'online', joinedAt: 1 }] },
      leaves: {},
      origin: null,
    }

    broadcaster.publish(source)
    const [event] = subscriber.received

    expect(Object.isFrozen(event)).toBe(true)
    if (event?.type === 'presence_diff') {
      expect(Object.isFrozen(event.joins.u1)).toBe(true)
      expect(event.joins).not.toBe(source.joins)
    }
  })

  it('should drop only the overflowing subscriber', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const slow = createSubscriber('slow', 2)
    const fast = createSubscriber('fast')
    broadcaster.subscribe(slow)
    broadcaster.subscribe(fast)

    for (let i = 0; i < 5; i++) {
      broadcaster.publish(typing(`u${i}`))
    }

    expect(slow.received.map((event) => event.seq)).toEqual([1, 2])
    expect(slow.overflows).toHaveLength(1)
    expect(slow.overflows[0]?.active).toBe(false)
    expect(broadcaster.isSubscribed('slow')).toBe(false)
    expect(fast.received.map((event) => event.seq)).toEqual([1, 2, 3, 4, 5])
  })

  it('should notify overflow after the fan-out completes', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const order: string[] = []
    const slow: Subscriber = {
      id: 'slow',
      enqueue: () => false,
      onOverflow: () => order.push('overflow'),
    }
    const fast: Subscriber = {
      id: 'fast',
      enqueue: () => {
        order.push('fast')
        return true
      },
      onOverflow: vi.fn(),
    }
    broadcaster.subscribe(slow)
    broadcaster.subscribe(fast)

    broadcaster.publish(typing('u1'))

    expect(order).toEqual(['fast', 'overflow'])
  })

  it('should not deliver the current event to subscribers added during fan-out', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const late = createSubscriber('late')
    const joiner: Subscriber = {
      id: 'joiner',
      enqueue: () => {
        if (!broadcaster.isSubscribed('late')) broadcaster.subscribe(late)
        return true
      },
      onOverflow: vi.fn(),
    }
    broadcaster.subscribe(joiner)

    broadcaster.publish(typing('u1'))
    broadcaster.publish(typing('u2'))

    expect(late.received.map((event) => event.seq)).toEqual([2])
  })

  it('should drop everything on close', () => {
    const broadcaster = createTopicBroadcaster('channel:general')
    const subscriber = createSubscriber('s1')
    const subscription = broadcaster.subscribe(subscriber)

    broadcaster.close()
    broadcaster.publish(typing('u1'))

    expect(subscription.active).toBe(false)
    expect(subscriber.received).toEqual([])
  })
})
