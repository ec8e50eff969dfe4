// Path: src/lib/config/parser.ts
// Narrows untyped JSON into a client configuration

import { ConfigError, MissingSubscriptionError } from '../../utils/error.js';
import { isRecord } from '../../utils/guards.js';
import { formatHost } from '../websocket/connection.js';
import type { Protocol, QueryParams, RawTransportOptions } from '../websocket/types.js';
import type {
  ClientConfig,
  ConsumerArgs,
  ProducerArgs,
  RoleArgs,
} from '../../services/supervisor/types.js';

function readString(section: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${field}.${key}`, `${field}.${key} must be a string`);
  }
  return value;
}

function requireString(section: Record<string, unknown>, key: string, field: string): string {
  const value = readString(section, key, field);
  if (value === undefined || value === '') {
    throw new ConfigError(`${field}.${key}`);
  }
  return value;
}

function parseProtocol(value: unknown): Protocol | undefined {
  if (value === undefined) return undefined;
  if (value === 'ws' || value === 'wss') return value;
  throw new ConfigError('protocol', `Unsupported protocol ${JSON.stringify(value)}, expected "ws" or "wss"`);
}

function parseQuery(value: unknown, field: string): QueryParams {
  if (!isRecord(value)) {
    throw new ConfigError(field, `${field} must be an object`);
  }

  const query: QueryParams = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      query[key] = entry;
    } else {
      throw new ConfigError(`${field}.${key}`, `${field}.${key} must be a string, number or boolean`);
    }
  }
  return query;
}

/**
 * Keys are copied as they are; the transport option builder filters them.
 */
function parseTransportOptions(value: unknown, field: string): RawTransportOptions {
  if (!isRecord(value)) {
    throw new ConfigError(field, `${field} must be an object`);
  }

  const options: RawTransportOptions = {};
  for (const [key, entry] of Object.entries(value)) {
    options[key] = entry;
  }
  return options;
}

function parseRoleArgs(value: unknown, field: string): RoleArgs {
  if (!isRecord(value)) {
    throw new ConfigError(field, `Section ${field} must be an object`);
  }

  const persistence = readString(value, 'persistence', field);
  return {
    tenant: requireString(value, 'tenant', field),
    namespace: requireString(value, 'namespace', field),
    topic: requireString(value, 'topic', field),
    ...(persistence !== undefined && { persistence }),
    ...(value.query !== undefined && { query: parseQuery(value.query, `${field}.query`) }),
    ...(value.transportOptions !== undefined && {
      transportOptions: parseTransportOptions(value.transportOptions, `${field}.transportOptions`),
    }),
  };
}

function parseProducers(value: unknown): ProducerArgs | ProducerArgs[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    const list: unknown[] = value;
    return list.map((entry, index) => parseRoleArgs(entry, `producer[${index}]`));
  }
  return parseRoleArgs(value, 'producer');
}

function parseConsumer(value: unknown): ConsumerArgs | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    throw new ConfigError('consumer', 'Section consumer takes a single connection; only producers accept a list');
  }

  const args = parseRoleArgs(value, 'consumer');
  const subscription = isRecord(value) ? readString(value, 'subscription', 'consumer') : undefined;
  if (subscription === undefined || subscription === '') {
    throw new MissingSubscriptionError();
  }
  return { ...args, subscription };
}

function parseReader(value: unknown): RoleArgs | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    throw new ConfigError('reader', 'Section reader takes a single connection; only producers accept a list');
  }
  return parseRoleArgs(value, 'reader');
}

/**
 * Narrow a parsed JSON document into a {@link ClientConfig}.
 *
 * The host is normalized to "host:port". Unknown top-level keys are
 * ignored; unknown transport option keys are kept for the builder to drop.
 *
 * @throws {ConfigError} when a field is missing or has the wrong type
 * @throws {InvalidHostFormatError} when the host has an unsupported shape
 */
export function parseClientConfig(raw: unknown): ClientConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('config', 'Configuration must be a JSON object');
  }

  if (raw.host === undefined || raw.host === null || raw.host === '') {
    throw new ConfigError('host');
  }
  const host = formatHost(raw.host);

  const name = readString(raw, 'name', 'config');
  const protocol = parseProtocol(raw.protocol);
  const producer = parseProducers(raw.producer);
  const consumer = parseConsumer(raw.consumer);
  const reader = parseReader(raw.reader);

  return {
    host,
    ...(name !== undefined && name !== '' && { name }),
    ...(protocol !== undefined && { protocol }),
    ...(raw.transportOptions !== undefined && {
      transportOptions: parseTransportOptions(raw.transportOptions, 'transportOptions'),
    }),
    ...(producer !== undefined && { producer }),
    ...(consumer !== undefined && { consumer }),
    ...(reader !== undefined && { reader }),
  };
}
