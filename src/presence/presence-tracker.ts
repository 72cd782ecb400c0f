/**
 * Presence Tracker
 *
 * Per-topic map of identity → metas (one meta per device). Every mutation
 * computes a `{ joins, leaves }` diff at meta granularity and publishes it
 * as a `presence_diff` event before returning it, so callers never publish
 * separately.
 *
 * - track: new meta under `joins`; re-tracking a device replaces its meta
 *   (old one under `leaves`)
 * - untrack: removed meta under `leaves`
 * - updateStatus: old meta under `leaves`, new meta under `joins`
 *
 * An identity's entry exists exactly while it holds at least one meta.
 * Empty diffs are returned but never published.
 */

import type {
  DomainEvent,
  PresenceDiff,
  PresenceMap,
  PresenceMeta,
  PresenceStatus,
} from '../types/index.js'
import { cloneMeta, clonePresence, emptyDiff, isEmptyDiff } from './diff.js'

export interface TrackOptions {
  status?: PresenceStatus
  name?: string
}

export interface PresenceTrackerOptions {
  topic: string
  /** Sink for presence_diff events (the topic's broadcaster) */
  publish: (event: DomainEvent) => void
  /** Clock for joinedAt (default: Date.now) */
  now?: () => number
}

export interface PresenceTracker {
  readonly topic: string

  track(identity: string, deviceId: string, options?: TrackOptions): PresenceDiff

  untrack(identity: string, deviceId: string): PresenceDiff

  updateStatus(identity: string, deviceId: string, status: PresenceStatus): PresenceDiff

  /** Deep copy of the current map */
  snapshot(): PresenceMap

  has(identity: string): boolean

  /** Metas currently held by one identity */
  metas(identity: string): PresenceMeta[]

  /** Number of identities present */
  count(): number

  /** Forget everything without publishing */
  reset(): void
}

export function createPresenceTracker(options: PresenceTrackerOptions): PresenceTracker {
  const { topic, publish } = options
  const now = options.now ?? Date.now

  /** identity → deviceId → meta, both insertion-ordered */
  const entries = new Map<string, Map<string, PresenceMeta>>()

  let refCounter = 0

  function nextRef(): string {
    refCounter++
    return String(refCounter)
  }

  function emit(diff: PresenceDiff): PresenceDiff {
    if (!isEmptyDiff(diff)) {
      publish({
        type: 'presence_diff',
        joins: clonePresence(diff.joins),
        leaves: clonePresence(diff.leaves),
        origin: null,
      })
    }
    return diff
  }

  return {
    topic,

    track(identity: string, deviceId: string, trackOptions: TrackOptions = {}): PresenceDiff {
      let devices = entries.get(identity)
      if (!devices) {
        devices = new Map()
        entries.set(identity, devices)
      }

      const diff = emptyDiff()
      const previous = devices.get(deviceId)
      if (previous) {
        diff.leaves[identity] = [cloneMeta(previous)]
        devices.delete(deviceId)
      }

      const meta: PresenceMeta = {
        ref: nextRef(),
        deviceId,
        status: trackOptions.status ?? 'online',
        joinedAt: now(),
        ...(trackOptions.name !== undefined && { name: trackOptions.name }),
      }
      devices.set(deviceId, meta)
      diff.joins[identity] = [cloneMeta(meta)]

      return emit(diff)
    },

    untrack(identity: string, deviceId: string): PresenceDiff {
      const devices = entries.get(identity)
      const meta = devices?.get(deviceId)
      if (!devices || !meta) return emptyDiff()

      devices.delete(deviceId)
      if (devices.size === 0) {
        entries.delete(identity)
      }

      const diff = emptyDiff()
      diff.leaves[identity] = [cloneMeta(meta)]
      return emit(diff)
    },

    updateStatus(identity: string, deviceId: string, status: PresenceStatus): PresenceDiff {
      const devices = entries.get(identity)
      const previous = devices?.get(deviceId)
      if (!devices || !previous || previous.status === status) return emptyDiff()

      // Re-inserted at the end, where applying the diff puts it
      const meta: PresenceMeta = { ...previous, ref: nextRef(), status }
      devices.delete(deviceId)
      devices.set(deviceId, meta)

      const diff = emptyDiff()
      diff.leaves[identity] = [cloneMeta(previous)]
      diff.joins[identity] = [cloneMeta(meta)]
      return emit(diff)
    },

    snapshot(): PresenceMap {
      const map: PresenceMap = {}
      for (const [identity, devices] of entries) {
        map[identity] = Array.from(devices.values(), cloneMeta)
      }
      return map
    },

    has(identity: string): boolean {
      return entries.has(identity)
    },

    metas(identity: string): PresenceMeta[] {
      return Array.from(entries.get(identity)?.values() ?? [], cloneMeta)
    },

    count(): number {
      return entries.size
    },

    reset(): void {
      entries.clear()
    },
  }
}
