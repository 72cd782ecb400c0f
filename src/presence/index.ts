/**
 * Presence Module
 *
 * Per-topic presence tracking with meta-level join/leave diffs.
 */

export {
  createPresenceTracker,
  type PresenceTracker,
  type PresenceTrackerOptions,
  type TrackOptions,
} from './presence-tracker.js'

export { applyPresenceDiff, emptyDiff, isEmptyDiff, clonePresence } from './diff.js'
