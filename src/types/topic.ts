/**
 * Topic Types
 *
 * Topic naming convention:
 * - `workspace:<workspace_id>` → workspace-wide stream
 * - `channel:<channel_id>` → one channel
 *
 * Any other shape is not a topic.
 */

export type TopicKind = 'workspace' | 'channel'

export interface Topic {
  kind: TopicKind
  id: string
  /** Canonical `<kind>:<id>` string */
  name: string
}

const TOPIC_PATTERN = /^(workspace|channel):([^:\s]+)$/

function isTopicKind(value: string): value is TopicKind {
  return value === 'workspace' || value === 'channel'
}

/**
 * Parse a topic name, or return null when it is not one
 *
 * @example
 * ```typescript
 * parseTopic('channel:general') // { kind: 'channel', id: 'general', name: 'channel:general' }
 * parseTopic('user:42')         // null
 * ```
 */
export function parseTopic(name: string): Topic | null {
  const match = TOPIC_PATTERN.exec(name)
  if (!match) return null

  const [, kind, id] = match
  if (kind === undefined || id === undefined || !isTopicKind(kind)) return null

  return { kind, id, name }
}

export function formatTopic(kind: TopicKind, id: string): string {
  return `${kind}:${id}`
}

export function workspaceTopic(workspaceId: string): Topic {
  return { kind: 'workspace', id: workspaceId, name: formatTopic('workspace', workspaceId) }
}
