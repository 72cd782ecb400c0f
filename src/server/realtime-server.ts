/**
 * Realtime Server
 *
 * WebSocket transport for the real-time layer. Each socket is
 * authenticated once through the `authenticate` hook, then handed to a
 * connection handler that keeps one session per joined topic. Frames are
 * JSON text; see the protocol module for their shapes.
 *
 * Dead clients are found by ping/pong heartbeat and terminated, which
 * terminates their sessions like any other close.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws'
import type { IncomingMessage } from 'node:http'
import type { Identity } from '../types/index.js'
import type { ChannelDirectory, MessageStore } from '../store/index.js'
import type { Connection } from '../session/index.js'
import { createAuthorizationGate } from '../auth/index.js'
import { createTopicRegistry, type TopicRegistry } from '../topics/index.js'
import { encodeServerMessage, type ServerMessage } from '../protocol/index.js'
import { createConnectionHandler, type ConnectionHandler } from './connection-handler.js'
import { resolveConfig, type RealtimeConfig, type RealtimeConfigInput } from '../config/index.js'
import { Errors } from '../errors/index.js'
import { prefixedId } from '../utils/id.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('ws-server')

/** Close code sent when `authenticate` yields no identity */
export const CLOSE_UNAUTHENTICATED = 4001

/**
 * Realtime server configuration
 */
export interface RealtimeServerOptions {
  /** Server settings; missing fields take their defaults */
  config?: RealtimeConfigInput

  store: MessageStore

  directory: ChannelDirectory

  /**
   * Resolve the identity behind an upgrade request. Returning null
   * closes the socket with code 4001.
   *
   * @example
   * ```typescript
   * authenticate: (request) => {
   *   const url = new URL(request.url ?? '/', 'http://localhost')
   *   const userId = url.searchParams.get('user')
   *   return userId ? { userId, deviceId: url.searchParams.get('device') ?? 'default' } : null
   * }
   * ```
   */
  authenticate: (request: IncomingMessage) => Identity | null | Promise<Identity | null>

  /** Topic registry to use (default: a new one) */
  registry?: TopicRegistry
}

/**
 * Client connection state
 */
interface ClientConnection {
  id: string
  ws: WebSocket
  alive: boolean
  /** Set once `authenticate` resolved an identity */
  handler: ConnectionHandler | null
  /** Frames that arrived before authentication finished */
  pending: string[]
}

export interface RealtimeServer {
  /** Start listening */
  start(): Promise<void>

  /** Terminate every session, close every socket and stop listening */
  stop(): Promise<void>

  /** Bound port (the configured one until started) */
  readonly port: number

  /** Open sockets */
  readonly connectionCount: number

  readonly registry: TopicRegistry

  readonly config: RealtimeConfig
}

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return data.toString('utf8')
}

function createSocketConnection(id: string, ws: WebSocket): Connection {
  return {
    id,
    send(message: ServerMessage): Promise<void> {
      return new Promise((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(Errors.internal('Socket is not open', { connectionId: id }))
          return
        }
        ws.send(encodeServerMessage(message), (err) => {
          if (err) reject(err)
          else resolve()
        })
      })
    },
  }
}

/**
 * Create a realtime server
 *
 * @example
 * ```typescript
 * const server = createRealtimeServer({
 *   config: { port: 4000 },
 *   store: createMemoryMessageStore(),
 *   directory,
 *   authenticate: (request) => identityFromToken(request),
 * })
 * await server.start()
 * ```
 */
export function createRealtimeServer(options: RealtimeServerOptions): RealtimeServer {
  const config = resolveConfig(options.config ?? {})
  const { port, host, path, maxPayloadSize, heartbeatInterval } = config

  const registry = options.registry ?? createTopicRegistry({ typingTimeoutMs: config.typingTimeoutMs })
  const gate = createAuthorizationGate(options.directory, { timeoutMs: config.storeTimeoutMs })

  let wss: WebSocketServer | null = null
  let heartbeatTimer: NodeJS.Timeout | null = null
  const clients = new Map<string, ClientConnection>()

  function dispatch(client: ClientConnection, handler: ConnectionHandler, raw: string): void {
    handler.receive(raw).catch((err: unknown) => {
      logger.error({ err, connectionId: client.id }, 'Unhandled frame error')
    })
  }

  async function authenticate(client: ClientConnection, request: IncomingMessage): Promise<void> {
    const identity = await options.authenticate(request)
    if (client.ws.readyState !== WebSocket.OPEN) return

    if (!identity) {
      logger.info({ connectionId: client.id }, 'Authentication failed, closing')
      client.ws.close(CLOSE_UNAUTHENTICATED, 'Unauthenticated')
      return
    }

    const handler = createConnectionHandler({
      connection: createSocketConnection(client.id, client.ws),
      identity,
      gate,
      store: options.store,
      registry,
      config,
    })
    client.handler = handler
    logger.debug({ connectionId: client.id, userId: identity.userId }, 'Client authenticated')

    for (const raw of client.pending.splice(0)) {
      dispatch(client, handler, raw)
    }
  }

  function release(client: ClientConnection): void {
    clients.delete(client.id)
    client.handler?.close('closed').catch((err: unknown) => {
      logger.error({ err, connectionId: client.id }, 'Session cleanup failed')
    })
  }

  /**
   * Handle new client connection
   */
  function handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const client: ClientConnection = {
      id: prefixedId('conn'),
      ws,
      alive: true,
      handler: null,
      pending: [],
    }

    clients.set(client.id, client)
    logger.info({ connectionId: client.id, remoteAddress: request.socket.remoteAddress }, 'Client connected')

    ws.on('message', (data) => {
      const raw = decode(data)
      if (client.handler) {
        dispatch(client, client.handler, raw)
      } else {
        client.pending.push(raw)
      }
    })

    // Heartbeat response
    ws.on('pong', () => {
      client.alive = true
    })

    ws.on('close', (code, reason) => {
      logger.info({ connectionId: client.id, code, reason: reason.toString() }, 'Client disconnected')
      release(client)
    })

    ws.on('error', (err) => {
      logger.error({ err, connectionId: client.id }, 'WebSocket error')
    })

    authenticate(client, request).catch((err: unknown) => {
      logger.error({ err, connectionId: client.id }, 'Authentication hook failed')
      ws.close(1011, 'Authentication error')
    })
  }

  /**
   * Heartbeat check
   */
  function heartbeat(): void {
    for (const client of clients.values()) {
      if (!client.alive) {
        logger.warn({ connectionId: client.id }, 'Client heartbeat timeout, terminating')
        client.ws.terminate()
        release(client)
        continue
      }

      client.alive = false
      client.ws.ping()
    }
  }

  return {
    config,
    registry,

    async start(): Promise<void> {
      return new Promise((resolve, reject) => {
        const server = new WebSocketServer({
          port,
          host,
          path,
          maxPayload: maxPayloadSize,
        })
        wss = server

        server.on('connection', handleConnection)

        server.on('error', (err) => {
          logger.error({ err }, 'WebSocket server error')
          reject(err)
        })

        server.on('listening', () => {
          logger.info({ port: server.address(), host, path }, 'WebSocket server listening')

          if (heartbeatInterval > 0) {
            heartbeatTimer = setInterval(heartbeat, heartbeatInterval)
          }

          resolve()
        })
      })
    },

    async stop(): Promise<void> {
      if (heartbeatTimer) {
        clearInterval(heartbeatTimer)
        heartbeatTimer = null
      }

      const open = Array.from(clients.values())
      clients.clear()
      await Promise.all(
        open.map(async (client) => {
          await client.handler?.close('shutdown')
          client.ws.close(1001, 'Server shutting down')
        })
      )
      registry.close()

      const server = wss
      wss = null
      if (!server) return

      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err)
            return
          }
          logger.info('WebSocket server stopped')
          resolve()
        })
      })
    },

    get port(): number {
      const address = wss?.address()
      return address && typeof address === 'object' ? address.port : port
    },

    get connectionCount(): number {
      return clients.size
    },
  }
}
