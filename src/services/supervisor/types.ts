// Path: src/services/supervisor/types.ts
// Supervision plan and client configuration types

import type {
  HostInput,
  Protocol,
  QueryParams,
  RawTransportOptions,
  Role,
} from '../../lib/websocket/types.js';
import type { ConnectionArgs, ConnectionProcessOptions } from '../../lib/websocket/client.js';
import type { ManagedProcess, RegisteredProcess } from '../../lib/process.js';

/**
 * Instance name used when the config does not give one
 */
export const DEFAULT_INSTANCE_NAME = 'default';

/**
 * Args of one producer, consumer or reader connection
 */
export interface RoleArgs {
  tenant: string;
  namespace: string;
  topic: string;
  /** "persistent" (default) or "non-persistent" */
  persistence?: string;
  /** Gateway query parameters, e.g. sendTimeoutMillis or receiverQueueSize */
  query?: QueryParams;
  /** Folded after the client-level options; scalar values here win */
  transportOptions?: RawTransportOptions;
  /** Always replaced by the client-level host */
  host?: HostInput;
  /** Always replaced by the client-level protocol */
  protocol?: string;
}

export type ProducerArgs = RoleArgs;

export interface ConsumerArgs extends RoleArgs {
  subscription: string;
}

export type ReaderArgs = RoleArgs;

/**
 * Configuration of one client instance
 */
export interface ClientConfig {
  /** Instance name, scopes the registry (default: "default") */
  name?: string;
  host: HostInput;
  /** default: "ws" */
  protocol?: Protocol;
  /** Shared by every connection of the instance */
  transportOptions?: RawTransportOptions;
  /** One producer, or a list to start several */
  producer?: ProducerArgs | readonly ProducerArgs[];
  consumer?: ConsumerArgs;
  reader?: ReaderArgs;
}

/**
 * A role section resolved to a single connection or a fan-out list
 */
export type RoleSection<T> =
  | { readonly kind: 'one'; readonly args: T }
  | { readonly kind: 'many'; readonly args: readonly T[] };

/**
 * Values every connection of an instance shares
 */
export interface SharedArgs {
  host: HostInput;
  protocol: string;
  transportOptions?: RawTransportOptions;
  /** Registry name */
  registry: string;
}

/**
 * Connection args as planned: the registry is referenced by name until
 * the supervisor hands the live registry to the process.
 */
export type PlannedConnectionArgs = Omit<ConnectionArgs, 'registry'> & { registry: string };

export interface RegistryChildPlan {
  readonly kind: 'registry';
  readonly id: string;
  readonly registryName: string;
}

export interface ConnectionChildPlan {
  readonly kind: 'connection';
  readonly id: string;
  readonly role: Role;
  /** Position within a producer list */
  readonly index?: number;
  readonly args: PlannedConnectionArgs;
  /** URL the connection will open */
  readonly url: string;
}

export type ChildPlan = RegistryChildPlan | ConnectionChildPlan;

/**
 * Ordered children of one client instance: the registry, then producers,
 * then the consumer, then the reader. Fixed once computed.
 */
export interface SupervisionPlan {
  readonly name: string;
  readonly supervisorName: string;
  readonly registryName: string;
  readonly host: string;
  readonly protocol: string;
  readonly children: readonly ChildPlan[];
}

export type SupervisorState = 'not_started' | 'starting' | 'running' | 'stopped' | 'failed';

export type ChildStatus = 'pending' | 'starting' | 'running' | 'restarting' | 'stopped';

/**
 * Snapshot of one supervised child
 */
export interface ChildInfo {
  readonly id: string;
  readonly kind: ChildPlan['kind'];
  readonly role?: Role;
  readonly status: ChildStatus;
  readonly restartCount: number;
  readonly process: ManagedProcess | null;
}

/**
 * Inbound payload from one of the connections
 */
export interface ClientMessage {
  readonly child: string;
  readonly role: Role;
  readonly data: string;
}

/**
 * Creates the process for a connection child
 */
export type ProcessFactory = (args: ConnectionArgs) => RegisteredProcess;

export interface SupervisorOptions {
  /** default: a ConnectionProcess over `ws` */
  processFactory?: ProcessFactory;
  /** Passed to the default ConnectionProcess */
  connectionOptions?: ConnectionProcessOptions;
}

/**
 * Events emitted by ClientSupervisor
 */
export interface ClientSupervisorEvents {
  started: () => void;
  child_restarted: (id: string, reason: Error | 'shutdown') => void;
  message: (message: ClientMessage) => void;
  stopped: () => void;
  error: (error: Error) => void;
}
