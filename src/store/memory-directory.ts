/**
 * In-memory ChannelDirectory
 *
 * Seedable directory for the example server and tests. Memberships can
 * change at runtime, and every call reads the current state.
 */

import type { Topic } from '../types/index.js'
import type { ChannelDirectory, ChannelVisibility } from './types.js'

export interface WorkspaceSeed {
  id: string
  members?: string[]
  admins?: string[]
}

export interface ChannelSeed {
  id: string
  workspaceId: string
  visibility?: ChannelVisibility
  archived?: boolean
  members?: string[]
}

export interface DirectorySeed {
  workspaces?: WorkspaceSeed[]
  channels?: ChannelSeed[]
}

interface WorkspaceRecord {
  members: Set<string>
  admins: Set<string>
}

interface ChannelRecord {
  workspaceId: string
  visibility: ChannelVisibility
  archived: boolean
  members: Set<string>
}

export interface MemoryDirectory extends ChannelDirectory {
  addWorkspaceMember(workspaceId: string, userId: string): void
  removeWorkspaceMember(workspaceId: string, userId: string): void
  addChannelMember(channelId: string, userId: string): void
  removeChannelMember(channelId: string, userId: string): void
  setArchived(channelId: string, archived: boolean): void
}

/**
 * Create an in-memory directory
 *
 * @example
 * ```typescript
 * const directory = createMemoryDirectory({
 *   workspaces: [{ id: 'acme', members: ['u1', 'u2'], admins: ['u1'] }],
 *   channels: [{ id: 'general', workspaceId: 'acme' }],
 * })
 * ```
 */
export function createMemoryDirectory(seed: DirectorySeed = {}): MemoryDirectory {
  const workspaces = new Map<string, WorkspaceRecord>()
  const channels = new Map<string, ChannelRecord>()

  for (const workspace of seed.workspaces ?? []) {
    const admins = new Set(workspace.admins ?? [])
    // Admins are members too
    const members = new Set([...(workspace.members ?? []), ...admins])
    workspaces.set(workspace.id, { members, admins })
  }

  for (const channel of seed.channels ?? []) {
    if (!workspaces.has(channel.workspaceId)) {
      workspaces.set(channel.workspaceId, { members: new Set(), admins: new Set() })
    }
    channels.set(channel.id, {
      workspaceId: channel.workspaceId,
      visibility: channel.visibility ?? 'public',
      archived: channel.archived ?? false,
      members: new Set(channel.members ?? []),
    })
  }

  function requireWorkspace(id: string): WorkspaceRecord {
    const workspace = workspaces.get(id)
    if (!workspace) throw new Error(`Unknown workspace '${id}'`)
    return workspace
  }

  function requireChannel(id: string): ChannelRecord {
    const channel = channels.get(id)
    if (!channel) throw new Error(`Unknown channel '${id}'`)
    return channel
  }

  return {
    async workspaceOf(topic: Topic): Promise<string | null> {
      if (topic.kind === 'workspace') {
        return workspaces.has(topic.id) ? topic.id : null
      }
      return channels.get(topic.id)?.workspaceId ?? null
    },

    async isMember(userId: string, topic: Topic): Promise<boolean> {
      if (topic.kind === 'workspace') {
        return workspaces.get(topic.id)?.members.has(userId) ?? false
      }
      return channels.get(topic.id)?.members.has(userId) ?? false
    },

    async visibility(topic: Topic): Promise<ChannelVisibility> {
      if (topic.kind === 'workspace') return 'public'
      return requireChannel(topic.id).visibility
    },

    async isArchived(topic: Topic): Promise<boolean> {
      if (topic.kind === 'workspace') return false
      return requireChannel(topic.id).archived
    },

    async isAdmin(userId: string, workspaceId: string): Promise<boolean> {
      return workspaces.get(workspaceId)?.admins.has(userId) ?? false
    },

    addWorkspaceMember(workspaceId: string, userId: string): void {
      requireWorkspace(workspaceId).members.add(userId)
    },

    removeWorkspaceMember(workspaceId: string, userId: string): void {
      requireWorkspace(workspaceId).members.delete(userId)
    },

    addChannelMember(channelId: string, userId: string): void {
      requireChannel(channelId).members.add(userId)
    },

    removeChannelMember(channelId: string, userId: string): void {
      requireChannel(channelId).members.delete(userId)
    },

    setArchived(channelId: string, archived: boolean): void {
      requireChannel(channelId).archived = archived
    },
  }
}
