/**
 * Connection Handler
 *
 * Routes one connection's frames to its sessions, one session per topic.
 * A `join` for a topic without a live session starts a fresh one; every
 * other command goes to the topic's session or is answered `not_joined`.
 *
 * Sessions that end (leave, denial, backpressure, fault) drop out of the
 * routing table, so the client's next `join` starts over in `connecting`.
 */

import type { Identity } from '../types/index.js'
import {
  createSession,
  type Session,
  type SessionOptions,
  type TerminationReason,
} from '../session/index.js'
import { errorMessage, parseCommand } from '../protocol/index.js'
import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('connection')

export type ConnectionHandlerOptions = Omit<SessionOptions, 'topic' | 'onTerminated'>

export interface ConnectionHandler {
  readonly id: string
  readonly identity: Identity

  /** Handle one raw client frame */
  receive(raw: string): Promise<void>

  /** Terminate every session of the connection and wait for their last frames */
  close(reason?: TerminationReason): Promise<void>

  /** Live session of a topic */
  session(topic: string): Session | undefined

  readonly sessionCount: number
}

export function createConnectionHandler(options: ConnectionHandlerOptions): ConnectionHandler {
  const { connection, identity } = options
  const log = logger.child({ connectionId: connection.id, userId: identity.userId })

  const sessions = new Map<string, Session>()
  let closed = false

  function open(topic: string): Session {
    const session = createSession({
      ...options,
      topic,
      onTerminated: (ended, reason) => {
        if (sessions.get(topic) === ended) {
          sessions.delete(topic)
        }
        log.debug({ topic, reason }, 'Session ended')
      },
    })
    sessions.set(topic, session)
    return session
  }

  return {
    id: connection.id,
    identity,

    async receive(raw: string): Promise<void> {
      if (closed) return

      const parsed = parseCommand(raw)
      if (!parsed.ok) {
        log.debug({ err: parsed.error, op: parsed.op }, 'Rejected frame')
        await connection.send(
          errorMessage(parsed.topic, parsed.op, parsed.error.reason, parsed.clientRef)
        )
        return
      }

      const { command } = parsed
      const current = sessions.get(command.topic)
      // A session still running its cleanup no longer takes commands
      const existing = current?.state === 'terminated' ? undefined : current

      if (command.op === 'join') {
        await (existing ?? open(command.topic)).handle(command)
        return
      }

      if (!existing) {
        const reason = Errors.notJoined(command.topic).reason
        await connection.send(errorMessage(command.topic, command.op, reason, command.client_ref))
        return
      }

      await existing.handle(command)
    },

    async close(reason: TerminationReason = 'closed'): Promise<void> {
      closed = true
      const live = Array.from(sessions.values())
      await Promise.all(
        live.map(async (session) => {
          await session.terminate(reason)
          await session.drained
        })
      )
      sessions.clear()
    },

    session(topic: string): Session | undefined {
      return sessions.get(topic)
    },

    get sessionCount(): number {
      return sessions.size
    },
  }
}
