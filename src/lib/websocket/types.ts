// Path: src/lib/websocket/types.ts
// Connection descriptor and socket capability types

import type { EventEmitter } from 'node:events';

/**
 * Connection role. Determines the URL shape and what the process does.
 */
export type Role = 'producer' | 'consumer' | 'reader';

/**
 * Broker-side storage mode of a topic
 */
export type Persistence = 'persistent' | 'non-persistent';

export type Protocol = 'ws' | 'wss';

/**
 * A single address/port pair
 */
export type HostPair = readonly [host: string, port: number] | { readonly host: string; readonly port: number };

/**
 * Host as accepted from configuration: "host:port", one pair,
 * or a list holding exactly one pair.
 */
export type HostInput = string | HostPair | readonly HostPair[];

/**
 * Fully resolved endpoint of one connection. Immutable once built.
 */
export interface ConnectionSettings {
  readonly url: string;
  readonly host: string;
  readonly protocol: string;
  readonly persistence: string;
  readonly tenant: string;
  readonly namespace: string;
  readonly topic: string;
}

/**
 * Input to the descriptor builder
 */
export interface ConnectionConfig {
  host: HostInput;
  /** "ws" or "wss" (default: "ws") */
  protocol?: Protocol | string;
  /** default: "persistent" */
  persistence?: Persistence | string;
  tenant: string;
  namespace: string;
  topic: string;
  /** Required for consumers, ignored otherwise */
  subscription?: string;
}

/**
 * Query parameter values accepted by the gateway
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP header sent with the upgrade request
 */
export type Header = readonly [name: string, value: string];

/**
 * Transport options as supplied by callers. Keys outside the
 * allow-list are accepted and dropped.
 */
export interface RawTransportOptions {
  authToken?: string;
  cacerts?: string | readonly string[];
  insecure?: boolean;
  socketConnectTimeout?: number;
  socketRecvTimeout?: number;
  extraHeaders?: readonly Header[];
  [key: string]: unknown;
}

/**
 * Filtered transport options forwarded to the socket layer
 */
export interface TransportOptions {
  readonly cacerts?: string | readonly string[];
  readonly insecure?: boolean;
  readonly socketConnectTimeout?: number;
  readonly socketRecvTimeout?: number;
  readonly extraHeaders?: readonly Header[];
}

/**
 * The subset of a websocket that connection processes rely on.
 * `ws` sockets satisfy it; tests use an in-process fake.
 *
 * Events: open, message(data), ping(data), pong(data),
 * close(code, reason), error(err)
 */
export interface GatewaySocket extends EventEmitter {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  pong(): void;
  close(code?: number): void;
  terminate(): void;
}

/**
 * Opens a socket for a URL. The socket connects asynchronously.
 */
export type SocketFactory = (url: string, options: TransportOptions) => GatewaySocket;

/**
 * WebSocket connection constants
 */
export const WS_CONSTANTS = {
  /** Interval between keepalive pings (ms) */
  KEEPALIVE_INTERVAL: 30000,
  /** Default TCP connect timeout (ms) */
  DEFAULT_CONNECT_TIMEOUT: 6000,
  /** Default wait for the upgrade response (ms) */
  DEFAULT_RECV_TIMEOUT: 5000,
  /** Socket readyState of an open connection */
  OPEN: 1,
  /** Normal closure */
  CLOSE_NORMAL: 1000,
} as const;
