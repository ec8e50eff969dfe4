// Path: src/lib/websocket/client.ts
// Connection process: one gateway socket per producer, consumer or reader

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { wsLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ExitReason, RegisteredProcess } from '../process.js';
import type { ProcessRegistry } from '../registry.js';
import {
  ConnectionClosedError,
  ConnectionNotOpenError,
  TransportStartFailure,
} from '../../utils/error.js';
import { buildConnectionSettings, encodeQuery, maskSensitiveUrl } from './connection.js';
import { buildTransportOptions, toWsClientOptions } from './transport-options.js';
import { createKeepalive, type KeepalivePolicy } from './keepalive.js';
import type {
  ConnectionSettings,
  GatewaySocket,
  HostInput,
  QueryParams,
  RawTransportOptions,
  Role,
  SocketFactory,
  TransportOptions,
} from './types.js';
import { WS_CONSTANTS } from './types.js';

/**
 * Everything a connection process needs to start: role args merged
 * with the values shared by the whole client instance.
 */
export interface ConnectionArgs {
  role: Role;
  /** Registry name of the process */
  name: string;
  registry: ProcessRegistry;
  host: HostInput;
  protocol?: string;
  persistence?: string;
  tenant: string;
  namespace: string;
  topic: string;
  subscription?: string;
  query?: QueryParams;
  /** Sources folded in order; later scalar values win */
  transportOptions: readonly RawTransportOptions[];
}

export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closed';

export interface ConnectionProcessOptions {
  socketFactory?: SocketFactory;
  keepaliveIntervalMs?: number;
}

/**
 * Open a `ws` socket to the gateway.
 */
export const createWsSocket: SocketFactory = (url: string, options: TransportOptions): GatewaySocket =>
  new WebSocket(url, toWsClientOptions(options));

function dataToString(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  if (Array.isArray(data) && data.every(d => Buffer.isBuffer(d))) return Buffer.concat(data).toString('utf-8');
  return '';
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * A supervised gateway connection.
 *
 * On start the process registers under its name, derives its URL and
 * transport options from its args and waits for the socket to open.
 * Once open, keepalive handles ping/pong and inbound payloads are
 * re-emitted as `message` events. An unexpected close ends the process
 * with a {@link ConnectionClosedError}; the supervisor restarts it.
 *
 * Events: message(data: string), exit(reason: ExitReason)
 */
export class ConnectionProcess extends EventEmitter implements RegisteredProcess {
  readonly name: string;
  readonly role: Role;

  private readonly args: ConnectionArgs;
  private readonly socketFactory: SocketFactory;
  private readonly keepaliveIntervalMs: number;
  private readonly log: Logger;

  private socket: GatewaySocket | null = null;
  private keepalive: KeepalivePolicy | null = null;
  private settings: ConnectionSettings | null = null;
  private state: ConnectionState = 'idle';

  constructor(args: ConnectionArgs, options: ConnectionProcessOptions = {}) {
    super();
    this.args = args;
    this.name = args.name;
    this.role = args.role;
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? WS_CONSTANTS.KEEPALIVE_INTERVAL;
    this.log = wsLogger.child({ connection: args.name, role: args.role });
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Settings of the current (or last) connection attempt
   */
  getSettings(): ConnectionSettings | null {
    return this.settings;
  }

  isRunning(): boolean {
    return this.state === 'connecting' || this.state === 'open';
  }

  /**
   * Register, connect and resolve once the socket is open.
   *
   * @throws {ConfigError} when the args do not describe a valid endpoint
   * @throws {DuplicateRegistrationError} when the name is already taken
   * @throws {TransportStartFailure} when the socket cannot connect
   */
  async start(): Promise<void> {
    if (this.isRunning()) {
      this.log.warn('Connection already started, ignoring start request');
      return;
    }

    const settings = buildConnectionSettings(this.args, this.role, encodeQuery(this.args.query));
    const transport = buildTransportOptions(this.args.transportOptions);

    this.args.registry.register(this.name, this);
    this.settings = settings;
    this.state = 'connecting';

    const url = maskSensitiveUrl(settings.url);
    this.log.info({ url }, 'Connecting to gateway');

    try {
      await this.connect(settings.url, transport);
    } catch (err) {
      const failure = err instanceof TransportStartFailure
        ? err
        : new TransportStartFailure(url, toError(err));
      this.log.error({ url, err: failure }, 'Failed to connect to gateway');
      this.terminate(failure);
      throw failure;
    }

    this.log.info({ url }, 'Connected to gateway');
  }

  /**
   * Close the connection on request.
   */
  stop(): Promise<void> {
    if (this.state === 'idle' || this.state === 'closed') {
      return Promise.resolve();
    }
    this.log.info('Closing connection');
    this.terminate('shutdown');
    return Promise.resolve();
  }

  kill(reason: Error = new Error('Connection killed')): void {
    if (this.state === 'idle' || this.state === 'closed') return;
    this.log.warn({ err: reason }, 'Connection killed');
    this.terminate(reason);
  }

  /**
   * Send a text frame.
   *
   * @throws {ConnectionNotOpenError} when the socket is not open
   */
  send(data: string): Promise<void> {
    const socket = this.socket;
    if (this.state !== 'open' || socket === null) {
      return Promise.reject(new ConnectionNotOpenError(this.name));
    }

    return new Promise((resolve, reject) => {
      socket.send(data, (err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private connect(url: string, transport: TransportOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      let socket: GatewaySocket;
      try {
        socket = this.socketFactory(url, transport);
      } catch (err) {
        reject(toError(err));
        return;
      }

      this.socket = socket;
      socket.on('error', (err: Error) => {
        this.log.warn({ err }, 'Socket error');
      });

      const cleanup = (): void => {
        socket.off('open', onOpen);
        socket.off('error', onError);
        socket.off('close', onClose);
      };
      const onOpen = (): void => {
        cleanup();
        this.handleOpen(socket);
        resolve();
      };
      const onError = (err: Error): void => {
        cleanup();
        reject(new TransportStartFailure(maskSensitiveUrl(url), err));
      };
      const onClose = (code: number, reason: Buffer): void => {
        cleanup();
        reject(new TransportStartFailure(maskSensitiveUrl(url), new ConnectionClosedError(code, reason.toString())));
      };

      socket.once('open', onOpen);
      socket.once('error', onError);
      socket.once('close', onClose);
    });
  }

  private handleOpen(socket: GatewaySocket): void {
    this.state = 'open';

    const keepalive = createKeepalive(socket, { intervalMs: this.keepaliveIntervalMs, log: this.log });
    this.keepalive = keepalive;
    keepalive.handleConnect();

    socket.on('ping', () => { keepalive.handlePing(); });
    socket.on('pong', () => { keepalive.handlePong(); });
    socket.on('message', (data: unknown) => {
      this.emit('message', dataToString(data));
    });
    socket.on('close', (code: number, reason: Buffer) => {
      this.handleClose(code, reason);
    });
  }

  private handleClose(code: number, reason: Buffer): void {
    if (this.state === 'closed') return;
    const reasonStr = reason.length > 0 ? reason.toString() : '';
    this.log.warn({ code, reason: reasonStr }, 'Connection closed by peer');
    this.terminate(new ConnectionClosedError(code, reasonStr));
  }

  /**
   * Single exit path: cancels keepalive, releases the socket and
   * emits `exit`, which also drops the registry entry.
   */
  private terminate(reason: ExitReason): void {
    if (this.state === 'closed') return;
    this.state = 'closed';

    this.keepalive?.stop();
    this.keepalive = null;

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      for (const event of ['open', 'message', 'ping', 'pong', 'close']) {
        socket.removeAllListeners(event);
      }
      try {
        if (reason === 'shutdown') {
          socket.close(WS_CONSTANTS.CLOSE_NORMAL);
        } else {
          socket.terminate();
        }
      } catch (err) {
        this.log.warn({ err }, 'Failed to release socket');
      }
    }

    this.emit('exit', reason);
  }
}
