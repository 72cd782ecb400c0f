/**
 * Presence diff helpers shared by the tracker and by consumers that keep
 * a local copy of a topic's presence.
 */

import type { PresenceDiff, PresenceMap, PresenceMeta } from '../types/index.js'

export function emptyDiff(): PresenceDiff {
  return { joins: {}, leaves: {} }
}

export function isEmptyDiff(diff: PresenceDiff): boolean {
  return Object.keys(diff.joins).length === 0 && Object.keys(diff.leaves).length === 0
}

export function cloneMeta(meta: PresenceMeta): PresenceMeta {
  return { ...meta }
}

export function clonePresence(state: PresenceMap): PresenceMap {
  const copy: PresenceMap = {}
  for (const [identity, metas] of Object.entries(state)) {
    copy[identity] = metas.map(cloneMeta)
  }
  return copy
}

/**
 * Apply a diff to a presence map and return the new map.
 *
 * Leaves are removed by `ref` first, then joins are appended. An identity
 * whose metas run out disappears from the result. The input is not
 * modified.
 *
 * @example
 * ```typescript
 * let presence = joined.snapshot.presence
 * socket.on('presence_diff', (diff) => {
 *   presence = applyPresenceDiff(presence, diff)
 * })
 * ```
 */
export function applyPresenceDiff(state: PresenceMap, diff: PresenceDiff): PresenceMap {
  const next = clonePresence(state)

  for (const [identity, removed] of Object.entries(diff.leaves)) {
    const current = next[identity]
    if (!current) continue
    const refs = new Set(removed.map((meta) => meta.ref))
    const remaining = current.filter((meta) => !refs.has(meta.ref))
    if (remaining.length > 0) {
      next[identity] = remaining
    } else {
      delete next[identity]
    }
  }

  for (const [identity, added] of Object.entries(diff.joins)) {
    if (added.length === 0) continue
    const refs = new Set(added.map((meta) => meta.ref))
    const kept = (next[identity] ?? []).filter((meta) => !refs.has(meta.ref))
    next[identity] = [...kept, ...added.map(cloneMeta)]
  }

  return next
}
