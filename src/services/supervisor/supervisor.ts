// Path: src/services/supervisor/supervisor.ts
// Rest-for-one supervision of the registry and gateway connections

import { EventEmitter } from 'node:events';
import { supervisorLogger as log } from '../../lib/logger.js';
import { ProcessRegistry } from '../../lib/registry.js';
import { isAbnormalExit, onExit, type ExitReason, type ManagedProcess } from '../../lib/process.js';
import { ConnectionProcess, type ConnectionArgs } from '../../lib/websocket/client.js';
import { ClientError, DuplicateRegistrationError, wrapError } from '../../utils/error.js';
import { nextTick } from '../../utils/timer.js';
import { planSupervision } from './plan.js';
import type {
  ChildInfo,
  ChildPlan,
  ChildStatus,
  ClientConfig,
  ClientMessage,
  ProcessFactory,
  SupervisionPlan,
  SupervisorOptions,
  SupervisorState,
} from './types.js';

/**
 * Internal state for tracking a supervised child.
 */
interface RunningChild {
  readonly plan: ChildPlan;
  process: ManagedProcess | null;
  status: ChildStatus;
  restartCount: number;
  detach: (() => void) | null;
}

/**
 * Top-level supervisor of one client instance.
 *
 * Starts the registry, then every producer, then the consumer, then the
 * reader. When a connection exits on its own, only that connection is
 * started again. When the registry exits, every connection is stopped (last
 * first) and the registry and connections are started again in order.
 * Restarts are unconditional: no backoff and no limit.
 *
 * Lifecycle: not_started -> starting -> running -> stopped, or
 * starting -> failed when a child cannot start during the first pass.
 * A DuplicateRegistrationError at any point moves the supervisor to failed.
 *
 * Events: see {@link ClientSupervisorEvents}
 */
export class ClientSupervisor extends EventEmitter {
  readonly name: string;
  readonly registry: ProcessRegistry;

  private readonly plan: SupervisionPlan;
  private readonly children: RunningChild[];
  private readonly processFactory: ProcessFactory;
  private state: SupervisorState = 'not_started';
  // Starts, restarts and shutdown run one at a time, in arrival order
  private queue: Promise<void> = Promise.resolve();

  /**
   * @throws {ConfigError} when the config is incomplete
   * @throws {InvalidHostFormatError} when the host has an unsupported shape
   */
  constructor(config: ClientConfig, options: SupervisorOptions = {}) {
    super();
    this.plan = planSupervision(config);
    this.name = this.plan.supervisorName;
    this.registry = new ProcessRegistry(this.plan.registryName);
    this.children = this.plan.children.map(plan => ({
      plan,
      process: null,
      status: 'pending',
      restartCount: 0,
      detach: null,
    }));

    const connectionOptions = options.connectionOptions;
    this.processFactory = options.processFactory ??
      ((args: ConnectionArgs) => new ConnectionProcess(args, connectionOptions));

    log.debug(
      {
        supervisor: this.name,
        children: this.plan.children.map(c => c.id),
      },
      'Supervisor initialized'
    );
  }

  getState(): SupervisorState {
    return this.state;
  }

  getPlan(): SupervisionPlan {
    return this.plan;
  }

  /**
   * Snapshot of every child, in start order
   */
  whichChildren(): ChildInfo[] {
    return this.children.map(child => this.describe(child));
  }

  getChild(id: string): ChildInfo | undefined {
    const child = this.children.find(c => c.plan.id === id);
    return child ? this.describe(child) : undefined;
  }

  /**
   * Send a frame to a connection by its registry name.
   *
   * @throws {ProcessNotFoundError} when no live connection has that name
   */
  send(name: string, data: string): Promise<void> {
    return this.registry.send(name, data);
  }

  /**
   * Start every child in plan order.
   *
   * If a child fails to start, the children already started are shut
   * down, the supervisor moves to `failed` and the error is rethrown.
   */
  start(): Promise<void> {
    if (this.state !== 'not_started') {
      return Promise.reject(new ClientError(`Supervisor ${this.name} was already started`, 'INVALID_STATE'));
    }
    this.state = 'starting';
    log.info({ supervisor: this.name, children: this.children.length }, 'Starting supervisor');

    return this.serialize(async () => {
      for (const child of this.children) {
        // stop() was called while starting
        if (this.state !== 'starting') return;
        try {
          await this.startChild(child);
        } catch (err) {
          this.state = 'failed';
          log.error({ supervisor: this.name, child: child.plan.id, err }, 'Child failed to start');
          await this.shutdownChildren();
          throw wrapError(err, 'CHILD_START_FAILURE', { child: child.plan.id });
        }
      }

      if (this.state !== 'starting') return;
      this.state = 'running';
      log.info({ supervisor: this.name }, 'Supervisor running');
      this.emit('started');
    });
  }

  /**
   * Stop every child, last started first. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped' || this.state === 'not_started') {
      this.state = 'stopped';
      return;
    }

    this.state = 'stopped';
    log.info({ supervisor: this.name }, 'Stopping supervisor');
    await this.serialize(() => this.shutdownChildren());
    this.emit('stopped');
  }

  private describe(child: RunningChild): ChildInfo {
    return {
      id: child.plan.id,
      kind: child.plan.kind,
      ...(child.plan.kind === 'connection' && { role: child.plan.role }),
      status: child.status,
      restartCount: child.restartCount,
      process: child.process,
    };
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private createProcess(plan: ChildPlan): ManagedProcess {
    if (plan.kind === 'registry') {
      return this.registry;
    }

    const proc = this.processFactory({ ...plan.args, registry: this.registry });
    proc.on('message', (data: string) => {
      const message: ClientMessage = { child: plan.id, role: plan.role, data };
      this.emit('message', message);
    });
    return proc;
  }

  private async startChild(child: RunningChild): Promise<void> {
    const proc = this.createProcess(child.plan);
    child.status = child.status === 'restarting' ? 'restarting' : 'starting';

    await proc.start();

    child.process = proc;
    child.status = 'running';
    child.detach = onExit(proc, (reason) => {
      this.handleExit(child, proc, reason);
    });
    log.debug({ supervisor: this.name, child: child.plan.id }, 'Child started');
  }

  private async stopChild(child: RunningChild): Promise<void> {
    const proc = child.process;
    child.detach?.();
    child.detach = null;
    child.process = null;
    child.status = 'stopped';

    if (!proc) return;

    try {
      await proc.stop();
    } catch (err) {
      log.warn({ supervisor: this.name, child: child.plan.id, err }, 'Failed to stop child');
    }
    proc.removeAllListeners('message');
  }

  private async shutdownChildren(): Promise<void> {
    for (const child of [...this.children].reverse()) {
      await this.stopChild(child);
    }
  }

  /**
   * Exit of a child we did not stop ourselves.
   */
  private handleExit(child: RunningChild, proc: ManagedProcess, reason: ExitReason): void {
    if (child.process !== proc) return;

    child.detach = null;
    child.process = null;
    child.status = 'stopped';

    if (isAbnormalExit(reason)) {
      log.warn({ supervisor: this.name, child: child.plan.id, err: reason }, 'Child terminated');
    } else {
      log.info({ supervisor: this.name, child: child.plan.id }, 'Child exited');
    }

    this.scheduleRestart(child, reason);
  }

  private scheduleRestart(child: RunningChild, reason: ExitReason): void {
    this.serialize(() => this.restartFrom(child, reason)).catch((err: unknown) => {
      this.fail(err).catch((failErr: unknown) => {
        log.fatal({ supervisor: this.name, err: failErr }, 'Supervisor failed during shutdown');
      });
    });
  }

  /**
   * Rest-for-one over the registry: a registry exit restarts every child.
   * A connection exit restarts that connection alone.
   */
  private async restartFrom(crashed: RunningChild, reason: ExitReason): Promise<void> {
    // A previous cascade may already have brought this child back
    if (this.state !== 'running' || crashed.process !== null) {
      return;
    }

    await nextTick();

    const affected = crashed.plan.kind === 'registry'
      ? this.children.slice(this.children.indexOf(crashed))
      : [crashed];

    for (const child of [...affected].reverse()) {
      if (child !== crashed) {
        await this.stopChild(child);
      }
    }

    log.info(
      {
        supervisor: this.name,
        child: crashed.plan.id,
        restarting: affected.map(c => c.plan.id),
      },
      'Restarting children'
    );

    for (const child of affected) {
      if (this.state !== 'running') return;

      child.status = 'restarting';
      try {
        await this.startChild(child);
        child.restartCount++;
      } catch (err) {
        if (err instanceof DuplicateRegistrationError) {
          throw err;
        }
        child.status = 'stopped';
        log.error({ supervisor: this.name, child: child.plan.id, err }, 'Child failed to restart');
        // Counts as a new exit of this child
        this.scheduleRestart(child, err instanceof Error ? err : new Error(String(err)));
        return;
      }
    }

    this.emit('child_restarted', crashed.plan.id, reason);
  }

  private async fail(err: unknown): Promise<void> {
    const error = err instanceof Error ? err : new Error(String(err));
    log.fatal({ supervisor: this.name, err: error }, 'Unrecoverable supervisor error');
    this.state = 'failed';
    await this.serialize(() => this.shutdownChildren());

    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}

/**
 * Create and start a supervisor for a client config.
 *
 * @example
 * const client = await startClient({
 *   host: 'broker:8080',
 *   producer: { tenant: 'public', namespace: 'default', topic: 'orders' },
 * });
 * await client.send('producer', JSON.stringify({ payload: 'aGk=' }));
 */
export async function startClient(config: ClientConfig, options?: SupervisorOptions): Promise<ClientSupervisor> {
  const supervisor = new ClientSupervisor(config, options);
  await supervisor.start();
  return supervisor;
}
