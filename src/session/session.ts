/**
 * Session
 *
 * One client's membership in one topic. Lifecycle:
 *
 *   connecting ──join──▶ joining ──allow──▶ joined ──▶ terminated
 *                           └──────deny──────────────────▲
 *
 * Commands run one at a time through the session's inbox. Store calls are
 * bounded by `storeTimeoutMs`; their failures reach only this session's
 * connection as a single `error`. Successful mutations are published to
 * the topic and come back to the sender through its own subscription.
 *
 * Outbound frames pass through a bounded queue drained by one loop per
 * session. When the topic cannot enqueue an event because the queue is
 * full, the session is terminated with `backpressure`; other sessions of
 * the topic are not affected.
 *
 * Termination runs its cleanup exactly once: the session's typing
 * indicator is stopped, its presence meta is untracked and it is
 * unsubscribed and detached from the topic owner.
 */

import type { DomainEvent, Identity, Message, PresenceStatus, TopicEvent } from '../types/index.js'
import { isTypingEvent } from '../types/index.js'
import type { AuthorizationGate } from '../auth/index.js'
import type { MessageStore, StoreResult } from '../store/index.js'
import type { JoinSnapshot, TopicMember, TopicOwner, TopicRegistry } from '../topics/index.js'
import type { Subscription } from '../broadcast/index.js'
import type { RealtimeConfig } from '../config/index.js'
import {
  errorMessage,
  toServerMessage,
  type ClientCommand,
  type ClientRef,
  type CommandOf,
  type CommandOp,
  type LeaveReason,
  type ServerMessage,
} from '../protocol/index.js'
import { Errors, isRealtimeError, toRealtimeError } from '../errors/index.js'
import { createOutboundQueue } from './outbound-queue.js'
import { createMailbox } from '../utils/mailbox.js'
import { withTimeout } from '../utils/timeout.js'
import { prefixedId } from '../utils/id.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('session')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type SessionState = 'connecting' | 'joining' | 'joined' | 'terminated'

/**
 * Why a session ended. `closed` (connection gone) and `denied` (join
 * refused) end without a `left` frame.
 */
export type TerminationReason = LeaveReason | 'closed' | 'denied'

/**
 * Outbound side of a transport connection
 */
export interface Connection {
  readonly id: string
  /** Resolves once the frame was handed to the transport */
  send(message: ServerMessage): Promise<void>
}

export type SessionConfig = Pick<
  RealtimeConfig,
  'storeTimeoutMs' | 'outboundQueueLimit' | 'recentMessageLimit' | 'olderMessageLimit'
>

export interface SessionOptions {
  topic: string
  identity: Identity
  connection: Connection
  gate: AuthorizationGate
  store: MessageStore
  registry: TopicRegistry
  config: SessionConfig
  /** Called once, after the termination cleanup ran */
  onTerminated?: (session: Session, reason: TerminationReason) => void
}

export interface Session {
  readonly id: string
  readonly topic: string
  readonly identity: Identity
  readonly state: SessionState
  readonly terminationReason: TerminationReason | null

  /** Presence status this session registers with */
  readonly status: PresenceStatus

  /** Frames waiting for the connection */
  readonly backlog: number

  /** Run one client command, join included */
  handle(command: ClientCommand): Promise<void>

  /** End the session; repeated calls share the first call's cleanup */
  terminate(reason: TerminationReason): Promise<void>

  /** Settles once every frame was handed to the connection */
  readonly drained: Promise<void>
}

type Outbound =
  | { kind: 'event'; event: TopicEvent }
  | { kind: 'frame'; message: ServerMessage }
  | { kind: 'joined'; snapshot: JoinSnapshot; recent: Promise<Message[]> }

/** Reasons whose session ends with a `left` frame on a live connection */
const LEFT_NOTICE: ReadonlySet<TerminationReason> = new Set<TerminationReason>([
  'left',
  'backpressure',
  'evicted',
  'fault',
  'shutdown',
])

function isLeaveReason(reason: TerminationReason): reason is LeaveReason {
  return LEFT_NOTICE.has(reason)
}

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export function createSession(options: SessionOptions): Session {
  const { topic, identity, connection, gate, store, registry, config, onTerminated } = options

  const id = prefixedId('sess')
  const log = logger.child({ sessionId: id, topic, userId: identity.userId })
  const queue = createOutboundQueue<Outbound>(config.outboundQueueLimit)
  const inbox = createMailbox()

  let state: SessionState = 'connecting'
  let terminationReason: TerminationReason | null = null
  let termination: Promise<void> | null = null
  let status: PresenceStatus = 'online'
  let owner: TopicOwner | null = null
  let subscription: Subscription | null = null
  let attached = false
  /** This session started the identity's current typing indicator */
  let typingOwned = false

  function push(message: ServerMessage): void {
    queue.force({ kind: 'frame', message })
  }

  function pushError(op: CommandOp | 'unknown', reason: string, clientRef?: ClientRef): void {
    push(errorMessage(topic, op, reason, clientRef))
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Store calls
  // ───────────────────────────────────────────────────────────────────────────

  async function call<T>(operation: string, invoke: () => Promise<StoreResult<T>>): Promise<T> {
    const pending = invoke().catch((err: unknown) => {
      if (isRealtimeError(err)) throw err
      throw Errors.storeFailure(operation, err instanceof Error ? err.message : String(err))
    })

    const result = await withTimeout(pending, config.storeTimeoutMs, () =>
      Errors.storeTimeout(operation, config.storeTimeoutMs)
    )
    if (!result.ok) {
      throw Errors.fromReason(operation, result.reason)
    }
    return result.value
  }

  function loadRecent(): Promise<Message[]> {
    return call('listRecent', () => store.listRecent(topic, config.recentMessageLimit)).catch(
      (err: unknown) => {
        log.warn({ err }, 'Recent messages unavailable, joining with an empty backlog')
        return []
      }
    )
  }

  function currentOwner(): TopicOwner {
    if (state !== 'joined' || !owner) throw Errors.notJoined(topic)
    return owner
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Topic membership
  // ───────────────────────────────────────────────────────────────────────────

  const member: TopicMember = {
    id,
    identity,

    get status(): PresenceStatus {
      return status
    },

    enqueue(event: TopicEvent): boolean {
      if (state === 'terminated') return true
      if (isTypingEvent(event) && event.origin === identity.userId) return true
      return queue.push({ kind: 'event', event })
    },

    onOverflow(overflowed: Subscription): void {
      if (subscription?.id !== overflowed.id) return
      log.warn({ limit: config.outboundQueueLimit }, 'Outbound queue full, terminating session')
      void session.terminate('backpressure')
    },

    joined(snapshot: JoinSnapshot): void {
      if (state === 'terminated') return
      owner = snapshot.owner
      subscription = snapshot.subscription
      state = 'joined'
      if (snapshot.restarted) {
        // The previous owner's typing table is gone
        typingOwned = false
        log.info({ generation: snapshot.owner.generation }, 'Re-joined restarted topic owner')
      }
      queue.force({ kind: 'joined', snapshot, recent: loadRecent() })
    },

    evicted(error): void {
      if (state === 'terminated') return
      log.warn({ err: error }, 'Evicted from topic')
      void session.terminate('evicted')
    },
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Commands
  // ───────────────────────────────────────────────────────────────────────────

  async function join(command: CommandOf<'join'>): Promise<void> {
    if (state !== 'connecting') {
      pushError('join', Errors.alreadyJoined(topic).reason, command.client_ref)
      return
    }

    state = 'joining'
    const decision = await gate.authorize(identity, topic)
    if (state !== 'joining') return

    if (!decision.allowed) {
      log.info({ reason: decision.reason }, 'Join denied')
      pushError('join', decision.reason, command.client_ref)
      await session.terminate('denied')
      return
    }

    attached = true
    try {
      await registry.attach(topic, member)
    } catch (err) {
      if (session.state === 'terminated') return
      const error = toRealtimeError(err)
      log.error({ err: error }, 'Join failed')
      pushError('join', error.reason, command.client_ref)
      await session.terminate('fault')
      return
    }

    log.debug('Joined')
  }

  async function publishResult<T extends DomainEvent>(
    operation: string,
    invoke: () => Promise<StoreResult<T>>
  ): Promise<void> {
    const event = await call(operation, invoke)
    // Stored events are published even if the session ended meanwhile
    const target = state === 'joined' && owner ? owner : registry.get(topic)
    if (!target) {
      log.debug({ operation, type: event.type }, 'Topic has no members left, event not published')
      return
    }
    await target.publish(event)
  }

  async function execute(command: ClientCommand): Promise<void> {
    if (command.op === 'join') {
      await join(command)
      return
    }

    if (state !== 'joined') {
      pushError(command.op, Errors.notJoined(topic).reason, command.client_ref)
      return
    }

    const { userId } = identity

    switch (command.op) {
      case 'leave':
        await session.terminate('left')
        return

      case 'send_message': {
        const { content, attachments, thread_id: threadId } = command
        if (threadId !== undefined) {
          await publishResult('createThreadReply', () =>
            store.createThreadReply({ topic, authorId: userId, content, attachments, threadId })
          )
          return
        }
        await publishResult('createMessage', () =>
          store.createMessage({ topic, authorId: userId, content, attachments })
        )
        return
      }

      case 'edit_message':
        await publishResult('editMessage', () =>
          store.editMessage({ topic, messageId: command.message_id, userId, content: command.content })
        )
        return

      case 'delete_message':
        await publishResult('deleteMessage', () =>
          store.deleteMessage({ topic, messageId: command.message_id, userId })
        )
        return

      case 'add_reaction':
        await publishResult('addReaction', () =>
          store.addReaction({ topic, messageId: command.message_id, userId, emoji: command.emoji })
        )
        return

      case 'remove_reaction':
        await publishResult('removeReaction', () =>
          store.removeReaction({ topic, messageId: command.message_id, userId, emoji: command.emoji })
        )
        return

      case 'mark_read':
        await publishResult('markRead', () =>
          store.markRead({ topic, messageId: command.message_id, userId })
        )
        return

      case 'load_older_messages': {
        const messages = await call('listBefore', () =>
          store.listBefore(topic, command.before_id, config.olderMessageLimit)
        )
        push({
          event: 'older_messages_loaded',
          topic,
          messages,
          ...(command.client_ref !== undefined && { client_ref: command.client_ref }),
        })
        return
      }

      case 'start_thread': {
        const thread = await call('getThread', () =>
          store.getThread({ topic, messageId: command.message_id, userId })
        )
        push({
          event: 'thread_started',
          topic,
          message_id: command.message_id,
          message: thread.message,
          replies: thread.replies,
          ...(command.client_ref !== undefined && { client_ref: command.client_ref }),
        })
        return
      }

      case 'typing_start':
        await currentOwner().typingStart(member)
        typingOwned = true
        return

      case 'typing_stop':
        await currentOwner().typingStop(member)
        typingOwned = false
        return

      case 'update_status':
        await currentOwner().updateStatus(member, command.status)
        status = command.status
        return
    }
  }

  async function run(command: ClientCommand): Promise<void> {
    try {
      await execute(command)
    } catch (err) {
      if (state === 'terminated') {
        log.debug({ err, op: command.op }, 'Command failed after termination')
        return
      }

      if (isRealtimeError(err)) {
        const level = err.status >= 500 ? 'warn' : 'debug'
        log[level]({ err, op: command.op }, 'Command rejected')
        pushError(command.op, err.reason, command.client_ref)
        return
      }

      // Anything else is a fault of this session alone
      log.error({ err, op: command.op }, 'Session fault')
      pushError(command.op, Errors.internal().reason, command.client_ref)
      await session.terminate('fault')
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Outbound drain
  // ───────────────────────────────────────────────────────────────────────────

  async function render(item: Outbound): Promise<ServerMessage> {
    switch (item.kind) {
      case 'event':
        return toServerMessage(item.event)
      case 'frame':
        return item.message
      case 'joined':
        return {
          event: 'joined',
          topic,
          snapshot: { presence: item.snapshot.presence, recent_messages: await item.recent },
          seq: item.snapshot.seq,
        }
    }
  }

  async function drain(): Promise<void> {
    let item = await queue.next()
    while (item !== undefined) {
      await connection.send(await render(item))
      item = await queue.next()
    }
  }

  const drained = drain().catch((err: unknown) => {
    log.debug({ err }, 'Connection stopped accepting frames')
    queue.clear()
    return session.terminate('closed')
  })

  // ───────────────────────────────────────────────────────────────────────────
  // Termination
  // ───────────────────────────────────────────────────────────────────────────

  async function cleanup(reason: TerminationReason): Promise<void> {
    if (attached) {
      try {
        await registry.detach(topic, member, { stopTyping: typingOwned })
      } catch (err) {
        log.warn({ err }, 'Detach from topic failed')
      }
    }
    owner = null
    subscription = null
    log.debug({ reason }, 'Session terminated')
    onTerminated?.(session, reason)
  }

  const session: Session = {
    id,
    topic,
    identity,
    drained,

    get state(): SessionState {
      return state
    },

    get terminationReason(): TerminationReason | null {
      return terminationReason
    },

    get status(): PresenceStatus {
      return status
    },

    get backlog(): number {
      return queue.size
    },

    handle(command: ClientCommand): Promise<void> {
      // Leave jumps the line so a slow store call cannot hold it back
      if (command.op === 'leave' && state === 'joined') {
        return session.terminate('left')
      }

      return inbox.post(() => run(command)).catch((err: unknown) => {
        log.debug({ err, op: command.op }, 'Command dropped after termination')
      })
    },

    terminate(reason: TerminationReason): Promise<void> {
      if (termination) return termination

      state = 'terminated'
      terminationReason = reason
      inbox.close(`Session ${id} terminated`)

      if (reason === 'backpressure') {
        queue.clear()
      }
      if (isLeaveReason(reason)) {
        queue.force({ kind: 'frame', message: { event: 'left', topic, reason } })
      }
      queue.close()

      termination = cleanup(reason)
      return termination
    },
  }

  return session
}
