/**
 * Server Module
 *
 * WebSocket transport and per-connection command routing.
 */

export {
  createRealtimeServer,
  CLOSE_UNAUTHENTICATED,
  type RealtimeServer,
  type RealtimeServerOptions,
} from './realtime-server.js'

export {
  createConnectionHandler,
  type ConnectionHandler,
  type ConnectionHandlerOptions,
} from './connection-handler.js'
