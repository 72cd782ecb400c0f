/**
 * Outbound Queue
 *
 * Bounded FIFO between a session and its connection. Producers push
 * synchronously and learn immediately whether the item fit; the session's
 * drain loop pulls with `next()`, which waits while the queue is empty and
 * resolves `undefined` once the queue is closed.
 */

export interface OutboundQueue<T> {
  /** Append an item; false when the queue is full or closed */
  push(item: T): boolean

  /** Append an item even when full; false only when closed */
  force(item: T): boolean

  /** Next item, waiting while empty; undefined once closed and drained */
  next(): Promise<T | undefined>

  /** Drop everything queued */
  clear(): void

  /** Refuse new items; `next()` resolves undefined after the remaining items */
  close(): void

  readonly size: number
  readonly limit: number
  readonly closed: boolean
}

export function createOutboundQueue<T>(limit: number): OutboundQueue<T> {
  const items: T[] = []
  let waiter: ((item: T | undefined) => void) | null = null
  let closed = false

  function deliver(item: T): void {
    if (waiter) {
      const resolve = waiter
      waiter = null
      resolve(item)
      return
    }
    items.push(item)
  }

  return {
    push(item: T): boolean {
      if (closed || items.length >= limit) return false
      deliver(item)
      return true
    },

    force(item: T): boolean {
      if (closed) return false
      deliver(item)
      return true
    },

    next(): Promise<T | undefined> {
      if (items.length > 0) {
        return Promise.resolve(items.shift())
      }
      if (closed) {
        return Promise.resolve(undefined)
      }
      return new Promise((resolve) => {
        waiter = resolve
      })
    },

    clear(): void {
      items.length = 0
    },

    close(): void {
      if (closed) return
      closed = true
      if (waiter) {
        const resolve = waiter
        waiter = null
        resolve(undefined)
      }
    },

    get size(): number {
      return items.length
    },

    get limit(): number {
      return limit
    },

    get closed(): boolean {
      return closed
    },
  }
}
