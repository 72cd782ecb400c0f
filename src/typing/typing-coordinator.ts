/**
 * Typing Coordinator
 *
 * Per-topic "is typing…" state with debounce and self-healing expiry.
 *
 * - start: first call publishes `typing_started`; repeated calls while the
 *   indicator is live only push its expiry forward
 * - stop: publishes `typing_stopped` if the indicator is live, else no-op
 * - expiry: after `timeoutMs` without a refresh the indicator is removed
 *   and `typing_stopped` is published, so a vanished client never leaves
 *   it stuck
 *
 * One timer per identity. Expiries are handed to `schedule` so an owner
 * can run them inside its own mailbox; a stale expiry (the state was
 * refreshed or stopped in the meantime) is ignored.
 */

import type { DomainEvent } from '../types/index.js'

export const DEFAULT_TYPING_TIMEOUT_MS = 5_000

export interface TypingCoordinatorOptions {
  topic: string
  /** Sink for typing events (the topic's broadcaster) */
  publish: (event: DomainEvent) => void
  /** Inactivity before an indicator stops by itself (default: 5000) */
  timeoutMs?: number
  /** Clock (default: Date.now) */
  now?: () => number
  /** Delivery of timer expiries (default: run immediately) */
  schedule?: (expire: () => void) => void
}

export interface TypingCoordinator {
  readonly topic: string

  /** @returns true when `typing_started` was published */
  start(identity: string): boolean

  /** @returns true when `typing_stopped` was published */
  stop(identity: string): boolean

  isTyping(identity: string): boolean

  /** Identities with a live indicator */
  typing(): string[]

  /** Expiry time of an identity's indicator, if live */
  expiresAt(identity: string): number | undefined

  /** Cancel every timer without publishing */
  dispose(): void
}

interface TypingState {
  identity: string
  expiresAt: number
  timer: ReturnType<typeof setTimeout>
  generation: number
}

export function createTypingCoordinator(options: TypingCoordinatorOptions): TypingCoordinator {
  const { topic, publish, timeoutMs = DEFAULT_TYPING_TIMEOUT_MS } = options
  const now = options.now ?? Date.now
  const schedule = options.schedule ?? ((expire: () => void) => expire())

  const states = new Map<string, TypingState>()
  let generations = 0
  let disposed = false

  function isLive(state: TypingState): boolean {
    return now() < state.expiresAt
  }

  function arm(identity: string): TypingState {
    generations++
    const generation = generations
    const timer = setTimeout(() => {
      schedule(() => expire(identity, generation))
    }, timeoutMs)

    const state: TypingState = {
      identity,
      expiresAt: now() + timeoutMs,
      timer,
      generation,
    }
    states.set(identity, state)
    return state
  }

  function remove(state: TypingState): void {
    clearTimeout(state.timer)
    states.delete(state.identity)
  }

  function publishStopped(identity: string): void {
    publish({ type: 'typing_stopped', identity, origin: identity })
  }

  function expire(identity: string, generation: number): void {
    if (disposed) return
    const state = states.get(identity)
    if (!state || state.generation !== generation) return

    remove(state)
    publishStopped(identity)
  }

  return {
    topic,

    start(identity: string): boolean {
      if (disposed) return false

      const existing = states.get(identity)
      if (existing && isLive(existing)) {
        clearTimeout(existing.timer)
        arm(identity)
        return false
      }

      if (existing) {
        // Expired, but its expiry has not been processed yet
        remove(existing)
        publishStopped(identity)
      }

      arm(identity)
      publish({ type: 'typing_started', identity, origin: identity })
      return true
    },

    stop(identity: string): boolean {
      const state = states.get(identity)
      if (!state) return false

      remove(state)
      publishStopped(identity)
      return true
    },

    isTyping(identity: string): boolean {
      const state = states.get(identity)
      return state !== undefined && isLive(state)
    },

    typing(): string[] {
      return Array.from(states.values())
        .filter(isLive)
        .map((state) => state.identity)
    },

    expiresAt(identity: string): number | undefined {
      const state = states.get(identity)
      return state && isLive(state) ? state.expiresAt : undefined
    },

    dispose(): void {
      disposed = true
      for (const state of states.values()) {
        clearTimeout(state.timer)
      }
      states.clear()
    },
  }
}
