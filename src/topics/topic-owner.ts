/**
 * Topic Owner
 *
 * The single serialized owner of one topic's mutable state: its presence
 * map, its typing table and its broadcaster. Every operation is posted to
 * the owner's mailbox and runs alone, so a presence diff and the publish
 * that carries it can never be split by another operation, and every
 * event of the topic gets its sequence number from one place.
 *
 * An operation that throws a RealtimeError rejects only itself. Anything
 * else thrown is a fault and crashes the owner: its state is dropped, its
 * mailbox is closed and `onCrash` hands the joined members to whoever
 * supervises it (the topic registry).
 */

import type {
  DomainEvent,
  Identity,
  PresenceDiff,
  PresenceMap,
  PresenceStatus,
} from '../types/index.js'
import {
  createTopicBroadcaster,
  type Subscriber,
  type Subscription,
  type TopicBroadcaster,
} from '../broadcast/index.js'
import { createPresenceTracker, emptyDiff, type PresenceTracker } from '../presence/index.js'
import { createTypingCoordinator, type TypingCoordinator } from '../typing/index.js'
import { createMailbox } from '../utils/mailbox.js'
import { createLogger } from '../utils/logger.js'
import { Errors, isRealtimeError, type RealtimeError } from '../errors/index.js'

const logger = createLogger('topic-owner')

/**
 * What a topic owner needs from a session
 */
export interface TopicMember extends Subscriber {
  readonly identity: Identity

  /** Presence status the member registers with */
  readonly status: PresenceStatus

  /**
   * Runs inside the owner's operation, right after the member was
   * subscribed and before any later event can reach it
   */
  joined(snapshot: JoinSnapshot): void

  /** The topic could not be restored after an owner fault */
  evicted(error: RealtimeError): void
}

export interface JoinSnapshot {
  owner: TopicOwner
  subscription: Subscription
  /** Presence at join time, including the joining member */
  presence: PresenceMap
  /** Tail sequence number the subscription starts after */
  seq: number
  /** True when the join re-registers a member after an owner restart */
  restarted: boolean
}

/**
 * State reachable from inside an owner operation
 */
export interface TopicState {
  readonly topic: string
  readonly broadcaster: TopicBroadcaster
  readonly presence: PresenceTracker
  readonly typing: TypingCoordinator
}

export interface TopicOwnerOptions {
  topic: string
  /** Typing inactivity timeout (default: 5000) */
  typingTimeoutMs?: number
  /** Clock (default: Date.now) */
  now?: () => number
  /** Restart count of this topic, for logs */
  generation?: number
  /** Called once when an operation faults */
  onCrash?: (owner: TopicOwner, error: unknown) => void
}

export interface TopicOwner {
  readonly topic: string
  readonly generation: number
  readonly crashed: boolean
  readonly disposed: boolean
  readonly memberCount: number

  /** True when there are no members and nothing is queued behind the running operation */
  readonly idle: boolean

  /** Run an operation on the topic's state inside the mailbox */
  dispatch<T>(operation: (state: TopicState) => T | Promise<T>): Promise<T>

  /** Track the member's presence, subscribe it, and hand it its snapshot */
  join(member: TopicMember, options?: { restarted?: boolean }): Promise<JoinSnapshot>

  /** Stop the member's typing indicator if it owns one, untrack and unsubscribe it */
  leave(member: TopicMember, options?: { stopTyping?: boolean }): Promise<void>

  typingStart(member: TopicMember): Promise<boolean>

  typingStop(member: TopicMember): Promise<boolean>

  updateStatus(member: TopicMember, status: PresenceStatus): Promise<PresenceDiff>

  /** Publish a collaborator-produced event; resolves to its seq */
  publish(event: DomainEvent): Promise<number>

  snapshot(): Promise<PresenceMap>

  hasMember(member: TopicMember): boolean

  /** Members whose join has completed */
  members(): TopicMember[]

  /** Cancel timers and drop subscribers without publishing */
  dispose(): void
}

/** Where a joined member sits on its owner */
interface Membership {
  subscription: Subscription
  /** Ref of the presence meta the member tracked */
  ref: string | undefined
}

/** False once another join of the same device replaced the member's meta */
function holdsMeta(presence: PresenceTracker, member: TopicMember, ref: string | undefined): boolean {
  const { userId, deviceId } = member.identity
  return presence.metas(userId).some((meta) => meta.deviceId === deviceId && meta.ref === ref)
}

export function createTopicOwner(options: TopicOwnerOptions): TopicOwner {
  const { topic, typingTimeoutMs, now, generation = 0, onCrash } = options

  const mailbox = createMailbox()
  const broadcaster = createTopicBroadcaster(topic)
  const publish = (event: DomainEvent): void => {
    broadcaster.publish(event)
  }
  const presence = createPresenceTracker({ topic, publish, now })
  const typing = createTypingCoordinator({
    topic,
    publish,
    timeoutMs: typingTimeoutMs,
    now,
    schedule: (expire) => {
      owner.dispatch(() => expire()).catch((err: unknown) => {
        logger.debug({ err, topic }, 'Typing expiry dropped')
      })
    },
  })

  const state: TopicState = { topic, broadcaster, presence, typing }

  /** member → membership, null while its join is queued */
  const members = new Map<TopicMember, Membership | null>()

  let crashed = false
  let disposed = false

  function teardown(): void {
    typing.dispose()
    broadcaster.close()
    presence.reset()
  }

  function crash(error: unknown): void {
    if (crashed || disposed) return
    crashed = true
    logger.error({ err: error, topic, generation }, 'Topic owner crashed')
    mailbox.close(`Topic owner for '${topic}' crashed`)
    teardown()
    onCrash?.(owner, error)
  }

  const owner: TopicOwner = {
    topic,
    generation,

    get crashed(): boolean {
      return crashed
    },

    get disposed(): boolean {
      return disposed
    },

    get memberCount(): number {
      return members.size
    },

    get idle(): boolean {
      return members.size === 0 && mailbox.pending === 0
    },

    dispatch<T>(operation: (state: TopicState) => T | Promise<T>): Promise<T> {
      if (crashed || disposed) {
        return Promise.reject(Errors.internal(`Topic owner for '${topic}' is gone`, { topic }))
      }

      return mailbox.post(async () => {
        try {
          return await operation(state)
        } catch (err) {
          if (isRealtimeError(err)) throw err
          crash(err)
          throw Errors.internal(`Topic owner for '${topic}' crashed`, { topic })
        }
      })
    },

    join(member: TopicMember, joinOptions: { restarted?: boolean } = {}): Promise<JoinSnapshot> {
      // Registered before the operation runs so the owner never looks idle
      members.set(member, null)

      return owner
        .dispatch(({ broadcaster, presence }) => {
          if (!members.has(member)) {
            throw Errors.internal('Member left before its join ran')
          }
          const { identity } = member
          const diff = presence.track(identity.userId, identity.deviceId, {
            status: member.status,
            name: identity.name,
          })
          const subscription = broadcaster.subscribe(member, broadcaster.tail)
          members.set(member, { subscription, ref: diff.joins[identity.userId]?.[0]?.ref })

          const snapshot: JoinSnapshot = {
            owner,
            subscription,
            presence: presence.snapshot(),
            seq: broadcaster.tail,
            restarted: joinOptions.restarted ?? false,
          }
          member.joined(snapshot)
          return snapshot
        })
        .catch((err: unknown) => {
          members.delete(member)
          throw err
        })
    },

    leave(member: TopicMember, leaveOptions: { stopTyping?: boolean } = {}): Promise<void> {
      if (!members.has(member)) return Promise.resolve()
      const membership = members.get(member)
      members.delete(member)
      if (!membership) return Promise.resolve()

      return owner.dispatch(({ broadcaster, presence, typing }) => {
        const { identity } = member
        if (leaveOptions.stopTyping) {
          typing.stop(identity.userId)
        }
        if (holdsMeta(presence, member, membership.ref)) {
          presence.untrack(identity.userId, identity.deviceId)
        }
        broadcaster.unsubscribe(membership.subscription)
      })
    },

    typingStart(member: TopicMember): Promise<boolean> {
      return owner.dispatch(({ typing }) => typing.start(member.identity.userId))
    },

    typingStop(member: TopicMember): Promise<boolean> {
      return owner.dispatch(({ typing }) => typing.stop(member.identity.userId))
    },

    updateStatus(member: TopicMember, status: PresenceStatus): Promise<PresenceDiff> {
      return owner.dispatch(({ presence }) => {
        const membership = members.get(member)
        if (!membership) throw Errors.notJoined(topic)
        if (!holdsMeta(presence, member, membership.ref)) return emptyDiff()

        const { userId, deviceId } = member.identity
        const diff = presence.updateStatus(userId, deviceId, status)
        const replaced = diff.joins[userId]?.[0]
        if (replaced) membership.ref = replaced.ref
        return diff
      })
    },

    publish(event: DomainEvent): Promise<number> {
      return owner.dispatch(({ broadcaster }) => broadcaster.publish(event))
    },

    snapshot(): Promise<PresenceMap> {
      return owner.dispatch(({ presence }) => presence.snapshot())
    },

    hasMember(member: TopicMember): boolean {
      return members.has(member)
    },

    members(): TopicMember[] {
      const joined: TopicMember[] = []
      for (const [member, membership] of members) {
        if (membership) joined.push(member)
      }
      return joined
    },

    dispose(): void {
      if (disposed) return
      disposed = true
      mailbox.close(`Topic owner for '${topic}' disposed`)
      teardown()
      members.clear()
    },
  }

  return owner
}
