/**
 * Example: in-memory chat server
 *
 * One workspace with a public and a private channel, backed by the
 * in-memory store. Clients authenticate with a token in the query string:
 *
 *   ws://localhost:4000/socket?token=alice-token&device=laptop
 *
 * then send JSON frames such as
 *
 *   {"op":"join","topic":"channel:general"}
 *   {"op":"send_message","topic":"channel:general","content":"hi"}
 *   {"op":"typing_start","topic":"channel:general"}
 */

import {
  createRealtimeServer,
  createMemoryDirectory,
  createMemoryMessageStore,
  createLogger,
  loadConfig,
  type Identity,
} from '../src/index.js'

const logger = createLogger('example')

// =============================================================================
// In-Memory Data
// =============================================================================

// Token -> user
const users: Record<string, { id: string; name: string }> = {
  'admin-token': { id: 'user-1', name: 'Admin' },
  'alice-token': { id: 'user-2', name: 'Alice' },
  'bob-token': { id: 'user-3', name: 'Bob' },
}

const directory = createMemoryDirectory({
  workspaces: [{ id: 'acme', members: ['user-1', 'user-2', 'user-3'], admins: ['user-1'] }],
  channels: [
    { id: 'general', workspaceId: 'acme' },
    { id: 'leads', workspaceId: 'acme', visibility: 'private', members: ['user-1', 'user-3'] },
    { id: 'old-news', workspaceId: 'acme', archived: true },
  ],
})

const store = createMemoryMessageStore()

// =============================================================================
// Server Setup
// =============================================================================

const server = createRealtimeServer({
  config: loadConfig(),
  store,
  directory,
  authenticate: (request): Identity | null => {
    const url = new URL(request.url ?? '/', 'http://localhost')
    const user = users[url.searchParams.get('token') ?? '']
    if (!user) return null
    return { userId: user.id, deviceId: url.searchParams.get('device') ?? 'default', name: user.name }
  },
})

async function main(): Promise<void> {
  await server.start()
  logger.info({ port: server.port, path: server.config.path }, 'Chat server ready')

  const shutdown = (): void => {
    logger.info('Shutting down')
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed')
        process.exit(1)
      })
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start')
  process.exit(1)
})
