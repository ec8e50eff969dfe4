// Path: src/lib/websocket/connection.ts
// Gateway URL building and sensitive data masking

import { ConfigError, InvalidHostFormatError, MissingSubscriptionError } from '../../utils/error.js';
import { isNonEmptyString, isPort, isRecord } from '../../utils/guards.js';
import type { ConnectionConfig, ConnectionSettings, QueryParams, Role } from './types.js';

const DEFAULT_PROTOCOL = 'ws';
const DEFAULT_PERSISTENCE = 'persistent';

function formatPair(value: unknown): string | undefined {
  let host: unknown;
  let port: unknown;

  if (Array.isArray(value)) {
    if (value.length !== 2) return undefined;
    host = value[0];
    port = value[1];
  } else if (isRecord(value)) {
    host = value.host;
    port = value.port;
  } else {
    return undefined;
  }

  if (!isNonEmptyString(host) || !isPort(port)) {
    return undefined;
  }
  return `${host}:${port}`;
}

/**
 * Render a configured host as "host:port".
 *
 * Accepts a literal "host:port" string (returned as is), one host/port
 * pair as a tuple or object, or a list holding exactly one such pair.
 *
 * @throws {InvalidHostFormatError} for any other shape
 */
export function formatHost(host: unknown): string {
  if (typeof host === 'string') {
    if (host.length === 0) {
      throw new InvalidHostFormatError(host);
    }
    return host;
  }

  const formatted = Array.isArray(host) && host.length === 1
    ? formatPair(host[0])
    : formatPair(host);

  if (formatted === undefined) {
    throw new InvalidHostFormatError(host);
  }
  return formatted;
}

function requireField(config: ConnectionConfig, field: 'tenant' | 'namespace' | 'topic'): string {
  const value: unknown = config[field];
  if (!isNonEmptyString(value)) {
    throw new ConfigError(field);
  }
  return value;
}

/**
 * Build the settings of one gateway connection.
 *
 * URL layout (parsed positionally by the gateway):
 *   {protocol}://{host}/ws/v2/{role}/{persistence}/{tenant}/{namespace}/{topic}[/{subscription}][?{query}]
 *
 * The subscription segment exists for consumers only. Output depends on
 * the inputs alone, so the same config always yields the same URL.
 *
 * @param config - Endpoint configuration
 * @param role - Connection role
 * @param extraQuery - Pre-encoded query string, appended when non-empty
 * @throws {ConfigError} when host, tenant, namespace or topic is missing
 * @throws {MissingSubscriptionError} for a consumer without subscription
 * @throws {InvalidHostFormatError} when the host has an unsupported shape
 */
export function buildConnectionSettings(
  config: ConnectionConfig,
  role: Role,
  extraQuery = ''
): ConnectionSettings {
  const rawHost: unknown = config.host;
  if (rawHost === undefined || rawHost === null || rawHost === '') {
    throw new ConfigError('host');
  }

  const host = formatHost(rawHost);
  const protocol = config.protocol ?? DEFAULT_PROTOCOL;
  const persistence = config.persistence ?? DEFAULT_PERSISTENCE;
  const tenant = requireField(config, 'tenant');
  const namespace = requireField(config, 'namespace');
  const topic = requireField(config, 'topic');

  let subscription = '';
  if (role === 'consumer') {
    if (!isNonEmptyString(config.subscription)) {
      throw new MissingSubscriptionError();
    }
    subscription = `/${config.subscription}`;
  }

  const baseUrl = `${protocol}://${host}/ws/v2/${role}/${persistence}/${tenant}/${namespace}/${topic}${subscription}`;
  const url = extraQuery === '' ? baseUrl : `${baseUrl}?${extraQuery}`;

  return Object.freeze({
    url,
    host,
    protocol,
    persistence,
    tenant,
    namespace,
    topic,
  });
}

/**
 * Encode role query parameters in insertion order.
 * Undefined values are skipped.
 *
 * @example
 * encodeQuery({ subscriptionType: 'Shared', receiverQueueSize: 500 })
 * // => 'subscriptionType=Shared&receiverQueueSize=500'
 */
export function encodeQuery(params?: QueryParams): string {
  if (!params) return '';

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  return search.toString();
}

/**
 * Mask sensitive URL parameters before logging.
 *
 * @param url - URL to mask
 * @returns URL with sensitive parameters masked
 */
export function maskSensitiveUrl(url: string): string {
  const sensitive = /([?&])(token|authToken|auth|key|secret|password)=[^&]*/gi;
  return url.replace(sensitive, '$1$2=***');
}
