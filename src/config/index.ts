/**
 * Configuration
 *
 * Runtime settings for the real-time layer, validated with zod.
 * Every field has a default, so `resolveConfig({})` is a working config.
 *
 * Environment variables (all optional):
 * - `CHATWIRE_PORT`, `CHATWIRE_HOST`, `CHATWIRE_PATH`
 * - `CHATWIRE_MAX_PAYLOAD_SIZE`, `CHATWIRE_HEARTBEAT_INTERVAL`
 * - `CHATWIRE_TYPING_TIMEOUT_MS`, `CHATWIRE_STORE_TIMEOUT_MS`
 * - `CHATWIRE_OUTBOUND_QUEUE_LIMIT`
 * - `CHATWIRE_RECENT_MESSAGE_LIMIT`, `CHATWIRE_OLDER_MESSAGE_LIMIT`
 */

import { z } from 'zod'
import { Errors } from '../errors/index.js'

export const RealtimeConfigSchema = z.object({
  /** Port to listen on (0 picks a free port) */
  port: z.coerce.number().int().min(0).max(65535).default(4000),

  /** Host to bind to */
  host: z.string().min(1).default('0.0.0.0'),

  /** Path for the WebSocket endpoint */
  path: z.string().startsWith('/').default('/socket'),

  /** Maximum inbound frame size in bytes */
  maxPayloadSize: z.coerce.number().int().positive().default(1024 * 1024),

  /** Heartbeat ping interval in ms, 0 disables */
  heartbeatInterval: z.coerce.number().int().min(0).default(30_000),

  /** Inactivity after which a typing indicator stops by itself */
  typingTimeoutMs: z.coerce.number().int().positive().default(5_000),

  /** Upper bound on any single MessageStore / ChannelDirectory call */
  storeTimeoutMs: z.coerce.number().int().positive().default(5_000),

  /** Events a session may hold unsent before it is terminated */
  outboundQueueLimit: z.coerce.number().int().positive().default(256),

  /** Backlog size pushed in the join snapshot */
  recentMessageLimit: z.coerce.number().int().positive().default(50),

  /** Page size for load_older_messages */
  olderMessageLimit: z.coerce.number().int().positive().default(20),
})

export type RealtimeConfig = z.infer<typeof RealtimeConfigSchema>
export type RealtimeConfigInput = z.input<typeof RealtimeConfigSchema>

const ENV_KEYS: Record<keyof RealtimeConfig, string> = {
  port: 'CHATWIRE_PORT',
  host: 'CHATWIRE_HOST',
  path: 'CHATWIRE_PATH',
  maxPayloadSize: 'CHATWIRE_MAX_PAYLOAD_SIZE',
  heartbeatInterval: 'CHATWIRE_HEARTBEAT_INTERVAL',
  typingTimeoutMs: 'CHATWIRE_TYPING_TIMEOUT_MS',
  storeTimeoutMs: 'CHATWIRE_STORE_TIMEOUT_MS',
  outboundQueueLimit: 'CHATWIRE_OUTBOUND_QUEUE_LIMIT',
  recentMessageLimit: 'CHATWIRE_RECENT_MESSAGE_LIMIT',
  olderMessageLimit: 'CHATWIRE_OLDER_MESSAGE_LIMIT',
}

/**
 * Validate a partial config and fill in defaults
 *
 * @throws RealtimeError with code INVALID naming the first bad field
 */
export function resolveConfig(input: RealtimeConfigInput = {}): RealtimeConfig {
  return parseConfig(input)
}

function parseConfig(input: Record<string, unknown>): RealtimeConfig {
  const result = RealtimeConfigSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue?.path.map(String).join('.') || 'config'
    throw Errors.invalid(field, issue?.message ?? 'invalid value')
  }
  return result.data
}

/**
 * Build a config from environment variables, with explicit overrides on top
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { port: 0 })
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RealtimeConfigInput = {}
): RealtimeConfig {
  const fromEnv: Record<string, unknown> = {}
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]
    if (value !== undefined && value !== '') {
      fromEnv[key] = value
    }
  }
  return parseConfig({ ...fromEnv, ...overrides })
}
