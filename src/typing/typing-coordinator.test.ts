/**
 * Typing Coordinator Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createTypingCoordinator, type TypingCoordinator } from './typing-coordinator.js'
import type { DomainEvent } from '../types/index.js'

describe('TypingCoordinator', () => {
  let published: DomainEvent[]
  let typing: TypingCoordinator

  beforeEach(() => {
    vi.useFakeTimers()
    published = []
    typing = createTypingCoordinator({
      topic: 'channel:general',
      publish: (event) => published.push(event),
      timeoutMs: 5000,
    })
  })

  afterEach(() => {
    typing.dispose()
    vi.useRealTimers()
  })

  function types(): string[] {
    return published.map((event) => event.type)
  }

  it('should publish typing_started on the first start', () => {
    expect(typing.start('u1')).toBe(true)

    expect(published).toEqual([{ type: 'typing_started', identity: 'u1', origin: 'u1' }])
    expect(typing.isTyping('u1')).toBe(true)
  })

  it('should collapse rapid starts into one typing_started', () => {
    for (let i = 0; i < 10; i++) {
      typing.start('u1')
      vi.advanceTimersByTime(200)
    }

    expect(types()).toEqual(['typing_started'])

    typing.stop('u1')
    expect(types()).toEqual(['typing_started', 'typing_stopped'])
  })

  it('should extend the expiry on every refresh', () => {
    typing.start('u1')
    const first = typing.expiresAt('u1')

    vi.advanceTimersByTime(4000)
    typing.start('u1')

    expect(typing.expiresAt('u1')).toBe((first ?? 0) + 4000)

    // The original deadline passes without an expiry
    vi.advanceTimersByTime(1500)
    expect(types()).toEqual(['typing_started'])

    vi.advanceTimersByTime(3500)
    expect(types()).toEqual(['typing_started', 'typing_stopped'])
  })

  it('should stop by itself after the timeout, exactly once', () => {
    typing.start('u1')

    vi.advanceTimersByTime(4999)
    expect(types()).toEqual(['typing_started'])

    vi.advanceTimersByTime(1)
    expect(published).toEqual([
      { type: 'typing_started', identity: 'u1', origin: 'u1' },
      { type: 'typing_stopped', identity: 'u1', origin: 'u1' },
    ])
    expect(typing.isTyping('u1')).toBe(false)

    vi.advanceTimersByTime(60_000)
    expect(published).toHaveLength(2)
  })

  it('should not publish for a stop without a live indicator', () => {
    expect(typing.stop('u1')).toBe(false)
    expect(published).toEqual([])
  })

  it('should cancel the timer on stop', () => {
    typing.start('u1')
    typing.stop('u1')

    vi.advanceTimersByTime(10_000)

    expect(types()).toEqual(['typing_started', 'typing_stopped'])
  })

  it('should keep timers independent per identity', () => {
    typing.start('u1')
    vi.advanceTimersByTime(2000)
    typing.start('u2')

    typing.stop('u1')
    expect(typing.isTyping('u2')).toBe(true)

    vi.advanceTimersByTime(5000)
    expect(published.map((event) => `${event.type}:${'identity' in event ? event.identity : ''}`)).toEqual([
      'typing_started:u1',
      'typing_started:u2',
      'typing_stopped:u1',
      'typing_stopped:u2',
    ])
  })

  it('should list live identities', () => {
    typing.start('u1')
    typing.start('u2')

    expect(typing.typing()).toEqual(['u1', 'u2'])
  })

  it('should restart after an expiry with a fresh typing_started', () => {
    typing.start('u1')
    vi.advanceTimersByTime(5000)

    expect(typing.start('u1')).toBe(true)
    expect(types()).toEqual(['typing_started', 'typing_stopped', 'typing_started'])
  })

  it('should route expiries through schedule', () => {
    const deferred: Array<() => void> = []
    const scheduled = createTypingCoordinator({
      topic: 'channel:general',
      publish: (event) => published.push(event),
      timeoutMs: 1000,
      schedule: (expire) => deferred.push(expire),
    })

    scheduled.start('u1')
    vi.advanceTimersByTime(1000)

    expect(types()).toEqual(['typing_started'])
    expect(deferred).toHaveLength(1)

    deferred[0]?.()
    expect(types()).toEqual(['typing_started', 'typing_stopped'])
    scheduled.dispose()
  })

  it('should ignore a deferred expiry made stale by a refresh', () => {
    const deferred: Array<() => void> = []
    const scheduled = createTypingCoordinator({
      topic: 'channel:general',
      publish: (event) => published.push(event),
      timeoutMs: 1000,
      schedule: (expire) => deferred.push(expire),
    })

    scheduled.start('u1')
    vi.advanceTimersByTime(1000)
    // Expired but not processed: the restart closes the old indicator first
    scheduled.start('u1')
    deferred[0]?.()

    expect(types()).toEqual(['typing_started', 'typing_stopped', 'typing_started'])
    expect(scheduled.isTyping('u1')).toBe(true)
    scheduled.dispose()
  })

  it('should cancel everything silently on dispose', () => {
    typing.start('u1')
    typing.start('u2')

    typing.dispose()
    vi.advanceTimersByTime(10_000)

    expect(types()).toEqual(['typing_started', 'typing_started'])
    expect(typing.start('u1')).toBe(false)
  })
})
