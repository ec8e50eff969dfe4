// Path: src/lib/websocket/index.ts
// WebSocket module re-exports

// Types
export type {
  Role,
  Persistence,
  Protocol,
  HostPair,
  HostInput,
  ConnectionSettings,
  ConnectionConfig,
  QueryParams,
  Header,
  RawTransportOptions,
  TransportOptions,
  GatewaySocket,
  SocketFactory,
} from './types.js';

export { WS_CONSTANTS } from './types.js';

// Descriptor builder
export { formatHost, buildConnectionSettings, encodeQuery, maskSensitiveUrl } from './connection.js';
export { buildTransportOptions, toWsClientOptions } from './transport-options.js';

// Keepalive
export { createKeepalive } from './keepalive.js';
export type { KeepalivePolicy, KeepaliveSocket, KeepaliveOptions } from './keepalive.js';

// Connection process
export { ConnectionProcess, createWsSocket } from './client.js';
export type { ConnectionArgs, ConnectionState, ConnectionProcessOptions } from './client.js';
