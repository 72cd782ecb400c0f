/**
 * Mailbox Tests
 */

import { describe, it, expect } from 'vitest'
import { createMailbox } from './mailbox.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('Mailbox', () => {
  it('should run tasks one at a time in posting order', async () => {
    const mailbox = createMailbox()
    const log: string[] = []
    const gate = deferred()

    const first = mailbox.post(async () => {
      log.push('first:start')
      await gate.promise
      log.push('first:end')
      return 1
    })
    const second = mailbox.post(() => {
      log.push('second')
      return 2
    })

    await Promise.resolve()
    expect(log).toEqual(['first:start'])
    expect(mailbox.pending).toBe(1)

    gate.resolve()
    await expect(first).resolves.toBe(1)
    await expect(second).resolves.toBe(2)
    expect(log).toEqual(['first:start', 'first:end', 'second'])
  })

  it('should keep draining after a task rejects', async () => {
    const mailbox = createMailbox()

    const failing = mailbox.post(() => {
      throw new Error('boom')
    })
    const next = mailbox.post(() => 'ok')

    await expect(failing).rejects.toThrow('boom')
    await expect(next).resolves.toBe('ok')
  })

  it('should report idle once everything ran', async () => {
    const mailbox = createMailbox()
    expect(mailbox.idle).toBe(true)

    const done = mailbox.post(() => undefined)
    expect(mailbox.idle).toBe(false)

    await done
    await Promise.resolve()
    await Promise.resolve()
    expect(mailbox.idle).toBe(true)
  })

  it('should reject queued and new tasks once closed', async () => {
    const mailbox = createMailbox()
    const gate = deferred()

    const running = mailbox.post(() => gate.promise)
    const queued = mailbox.post(() => 'never')

    mailbox.close('owner gone')
    gate.resolve()

    await expect(running).resolves.toBeUndefined()
    await expect(queued).rejects.toMatchObject({ code: 'INTERNAL_ERROR', message: 'owner gone' })
    await expect(mailbox.post(() => 'late')).rejects.toMatchObject({ message: 'owner gone' })
    expect(mailbox.closed).toBe(true)
  })
})
