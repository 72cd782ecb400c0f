/**
 * Identity Types
 *
 * The authenticated output of the transport handshake. The real-time
 * layer never verifies credentials itself; it trusts what the server's
 * `authenticate` hook returns.
 */

export interface Identity {
  /** Account identifier; presence and typing are keyed by it */
  userId: string

  /** One device or tab of that account; presence metas are keyed by it */
  deviceId: string

  /** Display name, copied into presence metas */
  name?: string
}
