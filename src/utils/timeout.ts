/**
 * Bounded waits for collaborator calls.
 */

/**
 * Race a promise against a timer. The timer is always cleared, and the
 * error from `onTimeout` is raised when it fires first.
 *
 * @example
 * ```typescript
 * const result = await withTimeout(store.listRecent(topic, 50), 5000, () =>
 *   Errors.storeTimeout('listRecent', 5000)
 * )
 * ```
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs)
  })

  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer)
  })
}
