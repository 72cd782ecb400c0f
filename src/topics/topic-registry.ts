/**
 * Topic Registry
 *
 * Supervisor of topic owners. Owners are created on first attach and
 * disposed once their last member detached and their mailbox drained.
 *
 * When an owner crashes the registry replaces it and re-joins every member
 * that had completed its join: presence is re-tracked, subscriptions start
 * over on the new broadcaster, and each member receives a fresh snapshot
 * with `restarted: true`. Typing indicators are not restored. A topic that
 * keeps crashing within the restart window evicts its members instead.
 */

import {
  createTopicOwner,
  type JoinSnapshot,
  type TopicMember,
  type TopicOwner,
} from './topic-owner.js'
import { createLogger } from '../utils/logger.js'
import { Errors, toRealtimeError } from '../errors/index.js'

const logger = createLogger('topic-registry')

export interface TopicRegistryOptions {
  /** Typing inactivity timeout handed to every owner */
  typingTimeoutMs?: number
  /** Clock (default: Date.now) */
  now?: () => number
  /** Restarts tolerated per topic within `restartWindowMs` (default: 3) */
  maxRestarts?: number
  /** Window for counting restarts (default: 10000) */
  restartWindowMs?: number
}

export interface TopicRegistry {
  /** Join a member to the topic's owner, creating the owner if needed */
  attach(topic: string, member: TopicMember): Promise<JoinSnapshot>

  /** Remove a member from whichever owner currently holds it */
  detach(topic: string, member: TopicMember, options?: { stopTyping?: boolean }): Promise<void>

  /** Current owner of a topic */
  get(topic: string): TopicOwner | undefined

  /** Topics with a live owner */
  topics(): string[]

  readonly size: number

  /** Dispose every owner */
  close(): void
}

export function createTopicRegistry(options: TopicRegistryOptions = {}): TopicRegistry {
  const { typingTimeoutMs, now = Date.now, maxRestarts = 3, restartWindowMs = 10_000 } = options

  const owners = new Map<string, TopicOwner>()
  /** topic → timestamps of recent restarts */
  const restarts = new Map<string, number[]>()

  function spawn(topic: string, generation: number): TopicOwner {
    const owner = createTopicOwner({
      topic,
      typingTimeoutMs,
      now,
      generation,
      onCrash: handleCrash,
    })
    owners.set(topic, owner)
    logger.debug({ topic, generation }, 'Topic owner started')
    return owner
  }

  function ownerFor(topic: string): TopicOwner {
    const existing = owners.get(topic)
    if (existing && !existing.crashed && !existing.disposed) return existing
    return spawn(topic, 0)
  }

  function recordRestart(topic: string): number {
    const cutoff = now() - restartWindowMs
    const recent = (restarts.get(topic) ?? []).filter((at) => at > cutoff)
    recent.push(now())
    restarts.set(topic, recent)
    return recent.length
  }

  function handleCrash(crashed: TopicOwner, error: unknown): void {
    const { topic } = crashed
    if (owners.get(topic) === crashed) {
      owners.delete(topic)
    }

    const members = crashed.members()
    if (members.length === 0) return

    const count = recordRestart(topic)
    if (count > maxRestarts) {
      logger.error(
        { topic, restarts: count, members: members.length },
        'Topic owner keeps crashing, evicting members'
      )
      const evicted = Errors.internal(`Topic '${topic}' is unavailable`, { topic })
      for (const member of members) {
        member.evicted(evicted)
      }
      return
    }

    logger.warn(
      { topic, generation: crashed.generation + 1, members: members.length, err: error },
      'Restarting topic owner'
    )

    const replacement = spawn(topic, crashed.generation + 1)
    for (const member of members) {
      replacement.join(member, { restarted: true }).catch((err: unknown) => {
        logger.warn({ err, topic, subscriberId: member.id }, 'Rejoin after restart failed')
        // A further crash re-joins the member itself
        if (!replacement.crashed) {
          member.evicted(toRealtimeError(err))
        }
      })
    }
  }

  return {
    attach(topic: string, member: TopicMember): Promise<JoinSnapshot> {
      return ownerFor(topic).join(member)
    },

    async detach(
      topic: string,
      member: TopicMember,
      detachOptions: { stopTyping?: boolean } = {}
    ): Promise<void> {
      const owner = owners.get(topic)
      if (!owner || !owner.hasMember(member)) return

      try {
        await owner.leave(member, detachOptions)
      } finally {
        if (owners.get(topic) === owner && owner.idle) {
          owners.delete(topic)
          owner.dispose()
          logger.debug({ topic }, 'Topic owner stopped')
        }
      }
    },

    get(topic: string): TopicOwner | undefined {
      return owners.get(topic)
    },

    topics(): string[] {
      return Array.from(owners.keys())
    },

    get size(): number {
      return owners.size
    },

    close(): void {
      for (const owner of owners.values()) {
        owner.dispose()
      }
      owners.clear()
      restarts.clear()
    },
  }
}
