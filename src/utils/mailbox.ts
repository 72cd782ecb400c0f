/**
 * Mailbox
 *
 * Serialized task queue: every posted task runs to completion (including
 * its awaits) before the next one starts. A topic owner funnels every
 * mutation of its state through one mailbox, so no two operations on the
 * same presence map or typing table ever interleave.
 *
 * A task must never post to its own mailbox and await the result; that
 * waits on itself.
 */

import { RealtimeError } from '../errors/realtime-error.js'

type Job = () => Promise<void>

export interface Mailbox {
  /** Enqueue a task; resolves or rejects with the task's outcome */
  post<T>(task: () => T | Promise<T>): Promise<T>

  /** Reject every queued task and refuse new ones */
  close(reason?: string): void

  /** Tasks waiting to run, excluding the running one */
  readonly pending: number

  /** True when nothing is running and nothing is queued */
  readonly idle: boolean

  readonly closed: boolean
}

export function createMailbox(): Mailbox {
  const queue: Job[] = []
  const rejections: Array<(err: Error) => void> = []
  let running = false
  let closed = false
  let closeReason = 'Mailbox closed'

  async function drain(): Promise<void> {
    running = true
    try {
      let job = queue.shift()
      while (job) {
        rejections.shift()
        await job()
        job = queue.shift()
      }
    } finally {
      running = false
    }
  }

  return {
    post<T>(task: () => T | Promise<T>): Promise<T> {
      if (closed) {
        return Promise.reject(new RealtimeError('INTERNAL_ERROR', closeReason))
      }

      return new Promise<T>((resolve, reject) => {
        queue.push(async () => {
          try {
            resolve(await task())
          } catch (err) {
            reject(err)
          }
        })
        rejections.push(reject)

        if (!running) {
          // Jobs settle their own promises; drain itself cannot reject
          void drain()
        }
      })
    },

    close(reason?: string): void {
      if (closed) return
      closed = true
      if (reason) closeReason = reason
      queue.length = 0
      const pendingRejections = rejections.splice(0)
      for (const reject of pendingRejections) {
        reject(new RealtimeError('INTERNAL_ERROR', closeReason))
      }
    },

    get pending(): number {
      return queue.length
    },

    get idle(): boolean {
      return !running && queue.length === 0
    },

    get closed(): boolean {
      return closed
    },
  }
}
