// Path: src/services/supervisor/plan.ts
// Expands a client config into the ordered list of supervised children

import { buildConnectionSettings, encodeQuery, formatHost } from '../../lib/websocket/connection.js';
import type { RawTransportOptions, Role } from '../../lib/websocket/types.js';
import { ProcessRegistry } from '../../lib/registry.js';
import { ConfigError } from '../../utils/error.js';
import { isRecord } from '../../utils/guards.js';
import {
  DEFAULT_INSTANCE_NAME,
  type ChildPlan,
  type ClientConfig,
  type ConnectionChildPlan,
  type PlannedConnectionArgs,
  type RoleArgs,
  type RoleSection,
  type SharedArgs,
  type SupervisionPlan,
} from './types.js';

const PROTOCOLS = ['ws', 'wss'];

function isArgsList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Resolve a role section to a single connection or a fan-out list.
 * A missing section resolves to undefined.
 */
export function toRoleSection<T>(value: T | readonly T[] | undefined): RoleSection<T> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (isArgsList(value)) {
    return { kind: 'many', args: value };
  }
  return { kind: 'one', args: value };
}

/**
 * Merge role args with the values shared by the instance.
 *
 * host, protocol and registry always come from the shared values; every
 * other key the caller set on the role wins. Transport options become an
 * ordered source list (shared first) so role scalars override shared ones
 * and headers from both are kept.
 */
export function mergeArgs(
  role: Role,
  name: string,
  args: RoleArgs & { subscription?: string },
  shared: SharedArgs
): PlannedConnectionArgs {
  const transportOptions = [shared.transportOptions, args.transportOptions]
    .filter((source): source is RawTransportOptions => source !== undefined);

  return {
    ...args,
    role,
    name,
    host: shared.host,
    protocol: shared.protocol,
    registry: shared.registry,
    transportOptions,
  };
}

function connectionChild(
  role: Role,
  id: string,
  args: RoleArgs & { subscription?: string },
  shared: SharedArgs,
  index?: number
): ConnectionChildPlan {
  if (!isRecord(args)) {
    throw new ConfigError(id, `Section ${id} must be an object`);
  }

  const merged = mergeArgs(role, id, args, shared);
  // Built here so config errors surface before anything starts
  const { url } = buildConnectionSettings(merged, role, encodeQuery(merged.query));

  return Object.freeze({
    kind: 'connection' as const,
    id,
    role,
    ...(index !== undefined && { index }),
    args: merged,
    url,
  });
}

function producerChildren(config: ClientConfig, shared: SharedArgs): ConnectionChildPlan[] {
  const section = toRoleSection(config.producer);
  if (!section) return [];

  switch (section.kind) {
    case 'one':
      return [connectionChild('producer', 'producer', section.args, shared)];
    case 'many':
      return section.args.map((args, index) =>
        connectionChild('producer', `producer:${index}`, args, shared, index)
      );
  }
}

function singleChild(
  role: 'consumer' | 'reader',
  section: RoleSection<RoleArgs & { subscription?: string }> | undefined,
  shared: SharedArgs
): ConnectionChildPlan[] {
  if (!section) return [];
  if (section.kind === 'many') {
    throw new ConfigError(role, `Section ${role} takes a single connection; only producers accept a list`);
  }
  return [connectionChild(role, role, section.args, shared)];
}

/**
 * Compute the supervision plan of a client instance.
 *
 * Pure: starts nothing and may be called ahead of {@link ClientSupervisor}.
 * Children come in restart order: registry, producers, consumer, reader.
 * Missing role sections contribute no children.
 *
 * @throws {ConfigError} when a required field is missing
 * @throws {InvalidHostFormatError} when the host has an unsupported shape
 */
export function planSupervision(config: ClientConfig): SupervisionPlan {
  const name = config.name ?? DEFAULT_INSTANCE_NAME;
  const registryName = ProcessRegistry.nameFor(name);

  const rawHost: unknown = config.host;
  if (rawHost === undefined || rawHost === null || rawHost === '') {
    throw new ConfigError('host');
  }
  const host = formatHost(rawHost);

  const protocol = config.protocol ?? 'ws';
  if (!PROTOCOLS.includes(protocol)) {
    throw new ConfigError('protocol', `Unsupported protocol "${protocol}", expected "ws" or "wss"`);
  }

  const shared: SharedArgs = {
    host: config.host,
    protocol,
    transportOptions: config.transportOptions,
    registry: registryName,
  };

  const children: ChildPlan[] = [
    { kind: 'registry', id: 'registry', registryName },
    ...producerChildren(config, shared),
    ...singleChild('consumer', toRoleSection(config.consumer), shared),
    ...singleChild('reader', toRoleSection(config.reader), shared),
  ];

  return Object.freeze({
    name,
    supervisorName: `${name}-supervisor`,
    registryName,
    host,
    protocol,
    children: Object.freeze(children),
  });
}
