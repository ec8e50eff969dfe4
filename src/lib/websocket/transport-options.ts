// Path: src/lib/websocket/transport-options.ts
// Transport option filtering and mapping onto ws client options

import type { ClientOptions } from 'ws';
import { wsLogger as log } from '../logger.js';
import { isNonEmptyString } from '../../utils/guards.js';
import type { Header, RawTransportOptions, TransportOptions } from './types.js';
import { WS_CONSTANTS } from './types.js';

interface FoldState {
  token?: string;
  cacerts?: string | readonly string[];
  insecure?: boolean;
  socketConnectTimeout?: number;
  socketRecvTimeout?: number;
  headers?: Header[];
}

function isHeader(value: unknown): value is Header {
  return Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string';
}

function isCacerts(value: unknown): value is string | readonly string[] {
  if (typeof value === 'string') return true;
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function dropInvalid(key: string): void {
  log.warn({ key }, 'Ignoring transport option with invalid value');
}

function isSourceList(
  raw: RawTransportOptions | readonly RawTransportOptions[]
): raw is readonly RawTransportOptions[] {
  return Array.isArray(raw);
}

function foldSource(state: FoldState, source: RawTransportOptions): void {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    switch (key) {
      case 'authToken':
        if (isNonEmptyString(value)) state.token = value;
        else dropInvalid(key);
        break;
      case 'cacerts':
        if (isCacerts(value)) state.cacerts = value;
        else dropInvalid(key);
        break;
      case 'insecure':
        if (typeof value === 'boolean') state.insecure = value;
        else dropInvalid(key);
        break;
      case 'socketConnectTimeout':
        if (isTimeout(value)) state.socketConnectTimeout = value;
        else dropInvalid(key);
        break;
      case 'socketRecvTimeout':
        if (isTimeout(value)) state.socketRecvTimeout = value;
        else dropInvalid(key);
        break;
      case 'extraHeaders': {
        if (!Array.isArray(value)) {
          dropInvalid(key);
          break;
        }
        const headers: unknown[] = value;
        const collected = (state.headers ??= []);
        for (const header of headers) {
          if (isHeader(header)) collected.push(header);
          else dropInvalid(key);
        }
        break;
      }
      default:
        log.debug({ key }, 'Dropping unsupported transport option');
    }
  }
}

/**
 * Filter caller-supplied options down to what the socket layer accepts.
 *
 * Several sources are folded in order: extraHeaders accumulate, every
 * other key is last-value-wins. An authToken never appears in the result;
 * it becomes one `Authorization: Bearer <token>` header placed ahead of
 * the caller's headers. Unknown keys are dropped.
 *
 * @example
 * buildTransportOptions({ authToken: 'tok', extraHeaders: [['X-A', '1']] })
 * // => { extraHeaders: [['Authorization', 'Bearer tok'], ['X-A', '1']] }
 */
export function buildTransportOptions(
  raw: RawTransportOptions | readonly RawTransportOptions[] = {}
): TransportOptions {
  const sources = isSourceList(raw) ? raw : [raw];
  const state: FoldState = {};

  for (const source of sources) {
    foldSource(state, source);
  }

  let extraHeaders: readonly Header[] | undefined = state.headers;
  if (state.token !== undefined) {
    const auth: Header = ['Authorization', `Bearer ${state.token}`];
    extraHeaders = [auth, ...(state.headers ?? [])];
  }

  return {
    ...(state.cacerts !== undefined && { cacerts: state.cacerts }),
    ...(state.insecure !== undefined && { insecure: state.insecure }),
    ...(state.socketConnectTimeout !== undefined && { socketConnectTimeout: state.socketConnectTimeout }),
    ...(state.socketRecvTimeout !== undefined && { socketRecvTimeout: state.socketRecvTimeout }),
    ...(extraHeaders !== undefined && { extraHeaders }),
  };
}

/**
 * Map transport options onto `ws` client options.
 *
 * The handshake timeout covers both the TCP connect and the wait for the
 * upgrade response. Automatic pong replies are disabled because the
 * keepalive policy answers pings itself.
 */
export function toWsClientOptions(options: TransportOptions): ClientOptions {
  const headers: Record<string, string> = {};
  for (const [name, value] of options.extraHeaders ?? []) {
    headers[name] = Object.hasOwn(headers, name) ? `${headers[name]}, ${value}` : value;
  }

  const connectTimeout = options.socketConnectTimeout ?? WS_CONSTANTS.DEFAULT_CONNECT_TIMEOUT;
  const recvTimeout = options.socketRecvTimeout ?? WS_CONSTANTS.DEFAULT_RECV_TIMEOUT;

  const clientOptions: ClientOptions = {
    headers,
    handshakeTimeout: connectTimeout + recvTimeout,
    autoPong: false,
  };

  if (options.cacerts !== undefined) {
    clientOptions.ca = typeof options.cacerts === 'string' ? options.cacerts : [...options.cacerts];
  }
  if (options.insecure === true) {
    clientOptions.rejectUnauthorized = false;
  }

  return clientOptions;
}
