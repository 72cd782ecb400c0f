/**
 * Authorization Gate Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createAuthorizationGate } from './authorization-gate.js'
import { createMemoryDirectory, type MemoryDirectory } from '../store/index.js'
import type { ChannelDirectory } from '../store/index.js'
import type { Identity } from '../types/index.js'

function identity(userId: string): Identity {
  return { userId, deviceId: `${userId}-web` }
}

describe('AuthorizationGate', () => {
  let directory: MemoryDirectory

  beforeEach(() => {
    directory = createMemoryDirectory({
      workspaces: [
        { id: 'acme', members: ['member', 'insider'], admins: ['admin'] },
        { id: 'other', members: ['outsider'] },
      ],
      channels: [
        { id: 'general', workspaceId: 'acme', visibility: 'public' },
        { id: 'secret', workspaceId: 'acme', visibility: 'private', members: ['insider'] },
        { id: 'old', workspaceId: 'acme', archived: true, members: ['member'] },
      ],
    })
  })

  describe('Workspace topics', () => {
    it('should allow active workspace members', async () => {
      const gate = createAuthorizationGate(directory)

      const decision = await gate.authorize(identity('member'), 'workspace:acme')

      expect(decision).toEqual({
        allowed: true,
        workspaceId: 'acme',
        topic: { kind: 'workspace', id: 'acme', name: 'workspace:acme' },
      })
    })

    it('should deny non-members', async () => {
      const gate = createAuthorizationGate(directory)

      expect(await gate.authorize(identity('outsider'), 'workspace:acme')).toEqual({
        allowed: false,
        reason: 'unauthorized',
      })
    })

    it('should deny unknown workspaces as not_found', async () => {
      const gate = createAuthorizationGate(directory)

      expect(await gate.authorize(identity('member'), 'workspace:nope')).toEqual({
        allowed: false,
        reason: 'not_found',
      })
    })
  })

  describe('Channel topics', () => {
    it('should allow any workspace member into a public unarchived channel', async () => {
      const gate = createAuthorizationGate(directory)

      for (const user of ['member', 'insider', 'admin']) {
        const decision = await gate.authorize(identity(user), 'channel:general')
        expect(decision.allowed).toBe(true)
      }
    })

    it('should deny members of other workspaces from a public channel', async () => {
      const gate = createAuthorizationGate(directory)

      expect(await gate.authorize(identity('outsider'), 'channel:general')).toEqual({
        allowed: false,
        reason: 'unauthorized',
      })
    })

    it('should deny non-members of a private channel even if they are admins', async () => {
      const gate = createAuthorizationGate(directory)

      for (const user of ['member', 'admin', 'outsider']) {
        expect(await gate.authorize(identity(user), 'channel:secret')).toEqual({
          allowed: false,
          reason: 'unauthorized',
        })
      }
      expect((await gate.authorize(identity('insider'), 'channel:secret')).allowed).toBe(true)
    })

    it('should only admit admins into archived channels', async () => {
      const gate = createAuthorizationGate(directory)

      expect(await gate.authorize(identity('member'), 'channel:old')).toEqual({
        allowed: false,
        reason: 'archived',
      })
      expect((await gate.authorize(identity('admin'), 'channel:old')).allowed).toBe(true)
    })

    it('should deny unknown channels as not_found', async () => {
      const gate = createAuthorizationGate(directory)

      expect(await gate.authorize(identity('member'), 'channel:missing')).toEqual({
        allowed: false,
        reason: 'not_found',
      })
    })

    it('should re-read membership on every attempt', async () => {
      const gate = createAuthorizationGate(directory)

      expect((await gate.authorize(identity('member'), 'channel:secret')).allowed).toBe(false)
      directory.addChannelMember('secret', 'member')
      expect((await gate.authorize(identity('member'), 'channel:secret')).allowed).toBe(true)
      directory.removeChannelMember('secret', 'member')
      expect((await gate.authorize(identity('member'), 'channel:secret')).allowed).toBe(false)
    })
  })

  describe('Malformed topics', () => {
    it.each(['general', 'user:42', 'channel:', 'channel:a:b', 'workspace: acme', ''])(
      'should deny %j as not_found',
      async (name) => {
        const gate = createAuthorizationGate(directory)
        expect(await gate.authorize(identity('member'), name)).toEqual({
          allowed: false,
          reason: 'not_found',
        })
      }
    )
  })

  describe('Directory failures', () => {
    afterEach(() => {
      vi.useRealTimers()
    })

    function failingDirectory(overrides: Partial<ChannelDirectory>): ChannelDirectory {
      return { ...directory, ...overrides }
    }

    it('should deny with store_failure when the directory throws', async () => {
      const gate = createAuthorizationGate(
        failingDirectory({
          workspaceOf: async () => {
            throw new Error('connection refused')
          },
        })
      )

      expect(await gate.authorize(identity('member'), 'channel:general')).toEqual({
        allowed: false,
        reason: 'store_failure',
      })
    })

    it('should deny with store_timeout when the directory hangs', async () => {
      vi.useFakeTimers()
      const gate = createAuthorizationGate(
        failingDirectory({ workspaceOf: () => new Promise<string | null>(() => {}) }),
        { timeoutMs: 100 }
      )

      const pending = gate.authorize(identity('member'), 'channel:general')
      await vi.advanceTimersByTimeAsync(100)

      expect(await pending).toEqual({ allowed: false, reason: 'store_timeout' })
    })
  })
})
