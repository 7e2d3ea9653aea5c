// @agent-studio/gateway — HTTP API, chat socket and per-connection relay

export { GatewayServer, type GatewayConfig, type GatewayDeps } from './server.js';
export { ConnectionManager, type Connection } from './connections.js';
export { ConnectionRelay, type RelayDeps, type RelayState, type ExchangeOutcome } from './relay.js';
export { createApi, type ApiContext } from './api.js';
export {
  parseFrame,
  encodeFrame,
  INVALID_FRAME_REASON,
  SESSION_NOT_FOUND_CLOSE_CODE,
} from './protocol.js';
