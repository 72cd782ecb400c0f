/**
 * Short unique ids for connections, sessions and subscriptions.
 *
 * URL-safe alphabet, rejection sampling over crypto bytes so every
 * character is equally likely.
 */

import { randomBytes } from 'node:crypto'

const URL_SAFE = 'useandom-26T198340PX75pxJACKVERYMINDBUSHWOLF_GQZbfghjklqvwyzrict'
const DEFAULT_SIZE = 21

// Largest multiple of the alphabet length that fits in a byte
const LIMIT = 256 - (256 % URL_SAFE.length)

export function sid(size: number = DEFAULT_SIZE): string {
  let id = ''
  while (id.length < size) {
    const bytes = randomBytes(size * 2)
    for (const byte of bytes) {
      if (byte >= LIMIT) continue
      id += URL_SAFE[byte % URL_SAFE.length]
      if (id.length === size) break
    }
  }
  return id
}

/**
 * Id with a readable prefix, e.g. `sess_V1StGXR8_Z5jdHi6B`
 */
export function prefixedId(prefix: string, size = 16): string {
  return `${prefix}_${sid(size)}`
}
