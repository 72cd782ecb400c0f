/**
 * In-memory topic member used by the topic tests
 */

import type { JoinSnapshot, TopicMember } from './topic-owner.js'
import type { RealtimeError } from '../errors/index.js'
import type { PresenceStatus, TopicEvent } from '../types/index.js'

export interface RecordingMember extends TopicMember {
  received: TopicEvent[]
  snapshots: JoinSnapshot[]
  evictions: RealtimeError[]
}

export function createRecordingMember(
  userId: string,
  deviceId = 'web',
  status: PresenceStatus = 'online'
): RecordingMember {
  const received: TopicEvent[] = []
  const snapshots: JoinSnapshot[] = []
  const evictions: RealtimeError[] = []

  return {
    id: `${userId}@${deviceId}`,
    identity: { userId, deviceId },
    status,
    received,
    snapshots,
    evictions,
    enqueue(event) {
      received.push(event)
      return true
    },
    onOverflow() {},
    joined(snapshot) {
      snapshots.push(snapshot)
    },
    evicted(error) {
      evictions.push(error)
    },
  }
}
