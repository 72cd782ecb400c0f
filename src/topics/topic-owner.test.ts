/**
 * Topic Owner Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createTopicOwner, type TopicOwner } from './topic-owner.js'
import { createRecordingMember } from './test-member.js'
import { Errors } from '../errors/index.js'

const TOPIC = 'channel:general'

describe('TopicOwner', () => {
  let owner: TopicOwner

  afterEach(() => {
    owner.dispose()
    vi.useRealTimers()
  })

  it('should hand a joining member a snapshot that includes itself', async () => {
    owner = createTopicOwner({ topic: TOPIC, now: () => 1000 })
    const alice = createRecordingMember('alice')

    const snapshot = await owner.join(alice)

    expect(alice.snapshots).toEqual([snapshot])
    expect(snapshot.seq).toBe(1)
    expect(snapshot.restarted).toBe(false)
    expect(snapshot.owner).toBe(owner)
    expect(snapshot.presence).toEqual({
      alice: [{ ref: '1', deviceId: 'web', status: 'online', joinedAt: 1000 }],
    })
    // Its own join diff was published before it subscribed
    expect(alice.received).toEqual([])
  })

  it('should deliver later joins to earlier members as presence diffs', async () => {
    owner = createTopicOwner({ topic: TOPIC, now: () => 1000 })
    const alice = createRecordingMember('alice')
    const bob = createRecordingMember('bob', 'phone', 'away')

    await owner.join(alice)
    const snapshot = await owner.join(bob)

    expect(snapshot.seq).toBe(2)
    expect(alice.received).toEqual([
      {
        type: 'presence_diff',
        joins: { bob: [{ ref: '2', deviceId: 'phone', status: 'away', joinedAt: 1000 }] },
        leaves: {},
        origin: null,
        seq: 2,
        topic: TOPIC,
      },
    ])
    expect(bob.received).toEqual([])
  })

  it('should number published events after the presence events', async () => {
    owner = createTopicOwner({ topic: TOPIC })
    const alice = createRecordingMember('alice')
    await owner.join(alice)

    const seq = await owner.publish({
      type: 'message_read',
      messageId: 'msg-000001',
      identity: 'alice',
      origin: 'alice',
    })

    expect(seq).toBe(2)
    expect(alice.received.map((event) => event.seq)).toEqual([2])
  })

  it('should stop typing and untrack on leave', async () => {
    owner = createTopicOwner({ topic: TOPIC, now: () => 1000 })
    const alice = createRecordingMember('alice')
    const bob = createRecordingMember('bob')
    await owner.join(alice)
    await owner.join(bob)
    await owner.typingStart(bob)

    await owner.leave(bob, { stopTyping: true })

    expect(alice.received.map((event) => event.type)).toEqual([
      'presence_diff',
      'typing_started',
      'typing_stopped',
      'presence_diff',
    ])
    expect(alice.received[3]).toMatchObject({
      leaves: { bob: [{ ref: '2', deviceId: 'web' }] },
      seq: 5,
    })
    expect(owner.hasMember(bob)).toBe(false)
    expect(await owner.snapshot()).toEqual({
      alice: [{ ref: '1', deviceId: 'web', status: 'online', joinedAt: 1000 }],
    })
  })

  it('should keep typing on leave when the member did not start it', async () => {
    owner = createTopicOwner({ topic: TOPIC })
    const alice = createRecordingMember('alice')
    const laptop = createRecordingMember('bob', 'laptop')
    const phone = createRecordingMember('bob', 'phone')
    await owner.join(alice)
    await owner.join(laptop)
    await owner.join(phone)
    await owner.typingStart(laptop)

    await owner.leave(phone)

    expect(alice.received.map((event) => event.type)).not.toContain('typing_stopped')
    expect(await owner.dispatch(({ typing }) => typing.isTyping('bob'))).toBe(true)
  })

  it('should leave a meta alone once the same device joined again', async () => {
    owner = createTopicOwner({ topic: TOPIC, now: () => 1000 })
    const observer = createRecordingMember('alice')
    const oldTab = createRecordingMember('bob', 'laptop')
    const newTab = createRecordingMember('bob', 'laptop')
    await owner.join(observer)
    await owner.join(oldTab)
    await owner.join(newTab)

    await owner.leave(oldTab)
    await expect(owner.updateStatus(newTab, 'away')).resolves.toMatchObject({
      joins: { bob: [{ ref: '4', status: 'away' }] },
    })

    expect(await owner.snapshot()).toEqual({
      alice: [{ ref: '1', deviceId: 'web', status: 'online', joinedAt: 1000 }],
      bob: [{ ref: '4', deviceId: 'laptop', status: 'away', joinedAt: 1000 }],
    })
  })

  it('should move a status change through presence', async () => {
    owner = createTopicOwner({ topic: TOPIC, now: () => 1000 })
    const alice = createRecordingMember('alice')
    await owner.join(alice)

    const diff = await owner.updateStatus(alice, 'busy')

    expect(diff).toEqual({
      joins: { alice: [{ ref: '2', deviceId: 'web', status: 'busy', joinedAt: 1000 }] },
      leaves: { alice: [{ ref: '1', deviceId: 'web', status: 'online', joinedAt: 1000 }] },
    })
  })

  it('should reject an operation raising a RealtimeError without crashing', async () => {
    const onCrash = vi.fn()
    owner = createTopicOwner({ topic: TOPIC, onCrash })

    await expect(
      owner.dispatch(() => {
        throw Errors.notFound('Message', 'msg-404')
      })
    ).rejects.toMatchObject({ code: 'NOT_FOUND' })

    expect(owner.crashed).toBe(false)
    expect(onCrash).not.toHaveBeenCalled()
    await expect(owner.dispatch(() => 'still running')).resolves.toBe('still running')
  })

  it('should crash on any other fault and refuse further operations', async () => {
    const onCrash = vi.fn()
    owner = createTopicOwner({ topic: TOPIC, onCrash })
    const alice = createRecordingMember('alice')
    await owner.join(alice)

    await expect(
      owner.dispatch(() => {
        throw new Error('corrupted state')
      })
    ).rejects.toMatchObject({ code: 'INTERNAL_ERROR' })

    expect(owner.crashed).toBe(true)
    expect(onCrash).toHaveBeenCalledTimes(1)
    expect(onCrash.mock.calls[0]?.[0]).toBe(owner)
    expect(owner.members()).toEqual([alice])
    await expect(owner.typingStart(alice)).rejects.toMatchObject({ code: 'INTERNAL_ERROR' })
  })

  it('should reject operations queued behind a crash', async () => {
    owner = createTopicOwner({ topic: TOPIC })

    const crash = owner.dispatch(() => {
      throw new Error('boom')
    })
    const queued = owner.dispatch(() => 'never')

    await expect(crash).rejects.toMatchObject({ code: 'INTERNAL_ERROR' })
    await expect(queued).rejects.toMatchObject({ code: 'INTERNAL_ERROR' })
  })

  it('should expire typing through the mailbox', async () => {
    vi.useFakeTimers()
    owner = createTopicOwner({ topic: TOPIC, typingTimeoutMs: 5000 })
    const alice = createRecordingMember('alice')
    const bob = createRecordingMember('bob')
    await owner.join(alice)
    await owner.join(bob)

    await owner.typingStart(bob)
    await vi.advanceTimersByTimeAsync(5000)

    expect(alice.received.map((event) => event.type)).toEqual([
      'presence_diff',
      'typing_started',
      'typing_stopped',
    ])
  })

  it('should only list members whose join completed', async () => {
    owner = createTopicOwner({ topic: TOPIC })
    const alice = createRecordingMember('alice')
    const bob = createRecordingMember('bob')
    await owner.join(alice)

    const pending = owner.join(bob)

    expect(owner.memberCount).toBe(2)
    expect(owner.members()).toEqual([alice])
    await pending
    expect(owner.members()).toEqual([alice, bob])
  })

  it('should be idle once the last member left', async () => {
    owner = createTopicOwner({ topic: TOPIC })
    const alice = createRecordingMember('alice')
    await owner.join(alice)
    expect(owner.idle).toBe(false)

    await owner.leave(alice)

    expect(owner.idle).toBe(true)
  })
})
