/**
 * Authorization Gate
 *
 * Decides whether an identity may join a topic. Rules, first match wins:
 *
 * 1. `workspace:*` → allow iff the identity is an active workspace member
 * 2. archived channel → allow only workspace admins, else `archived`
 * 3. private channel → allow iff explicit channel member, else `unauthorized`
 * 4. public channel → allow iff workspace member, else `unauthorized`
 * 5. unknown or malformed topic → `not_found`
 *
 * Nothing is cached: membership can change between two connections, so
 * every join attempt re-reads the directory.
 */

import type { Identity, Topic } from '../types/index.js'
import { parseTopic, workspaceTopic } from '../types/index.js'
import type { ChannelDirectory } from '../store/index.js'
import { Errors, toRealtimeError } from '../errors/index.js'
import { withTimeout } from '../utils/timeout.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('authorization')

export type DenyReason = 'archived' | 'unauthorized' | 'not_found' | 'store_failure' | 'store_timeout'

export type AuthorizationDecision =
  | { allowed: true; topic: Topic; workspaceId: string }
  | { allowed: false; reason: DenyReason }

export interface AuthorizationGate {
  authorize(identity: Identity, topicName: string): Promise<AuthorizationDecision>
}

export interface AuthorizationGateOptions {
  /** Upper bound on the whole directory lookup (default: 5000) */
  timeoutMs?: number
}

function deny(reason: DenyReason): AuthorizationDecision {
  return { allowed: false, reason }
}

/**
 * Create an authorization gate over a channel directory
 *
 * @example
 * ```typescript
 * const gate = createAuthorizationGate(directory)
 * const decision = await gate.authorize(identity, 'channel:general')
 * if (!decision.allowed) console.log(decision.reason)
 * ```
 */
export function createAuthorizationGate(
  directory: ChannelDirectory,
  options: AuthorizationGateOptions = {}
): AuthorizationGate {
  const { timeoutMs = 5000 } = options

  async function decide(identity: Identity, topic: Topic): Promise<AuthorizationDecision> {
    const workspaceId = await directory.workspaceOf(topic)
    if (workspaceId === null) return deny('not_found')

    const allow: AuthorizationDecision = { allowed: true, topic, workspaceId }

    if (topic.kind === 'workspace') {
      return (await directory.isMember(identity.userId, topic)) ? allow : deny('unauthorized')
    }

    if (await directory.isArchived(topic)) {
      return (await directory.isAdmin(identity.userId, workspaceId)) ? allow : deny('archived')
    }

    if ((await directory.visibility(topic)) === 'private') {
      return (await directory.isMember(identity.userId, topic)) ? allow : deny('unauthorized')
    }

    const workspace = workspaceTopic(workspaceId)
    return (await directory.isMember(identity.userId, workspace)) ? allow : deny('unauthorized')
  }

  return {
    async authorize(identity: Identity, topicName: string): Promise<AuthorizationDecision> {
      const topic = parseTopic(topicName)
      if (!topic) return deny('not_found')

      try {
        const decision = await withTimeout(decide(identity, topic), timeoutMs, () =>
          Errors.storeTimeout('authorize', timeoutMs)
        )
        if (!decision.allowed) {
          logger.debug({ userId: identity.userId, topic: topicName, reason: decision.reason }, 'Join denied')
        }
        return decision
      } catch (err) {
        const error = toRealtimeError(err)
        logger.error({ err, userId: identity.userId, topic: topicName }, 'Directory lookup failed')
        return deny(error.code === 'STORE_TIMEOUT' ? 'store_timeout' : 'store_failure')
      }
    },
  }
}
