// Path: src/lib/registry.ts
// Per-client namespace of live connection processes

import { EventEmitter } from 'node:events';
import { registryLogger as log } from './logger.js';
import { onExit, type ManagedProcess, type RegisteredProcess } from './process.js';
import {
  DuplicateRegistrationError,
  ProcessNotFoundError,
  RegistryUnavailableError,
} from '../utils/error.js';

/**
 * Name of a process within one registry. Used by a process to name
 * itself when it starts, and by anyone else to reach it afterwards.
 */
export interface ProcessAddress {
  readonly registry: ProcessRegistry;
  readonly name: string;
  whereis(): RegisteredProcess | undefined;
}

interface Entry {
  proc: RegisteredProcess;
  detach: () => void;
}

/**
 * Registry of unique names to live processes, scoped to one client instance.
 *
 * The registry is itself supervised: stopping or killing it drops every
 * entry, and the connections are restarted and register again. Entries disappear on their own when the process exits.
 */
export class ProcessRegistry extends EventEmitter implements ManagedProcess {
  readonly name: string;
  private readonly entries = new Map<string, Entry>();
  private running = false;

  constructor(name: string) {
    super();
    this.name = name;
  }

  /**
   * Derive the registry name of a client instance.
   */
  static nameFor(instanceName: string): string {
    return `${instanceName}-registry`;
  }

  start(): Promise<void> {
    this.running = true;
    log.debug({ registry: this.name }, 'Registry started');
    return Promise.resolve();
  }

  stop(): Promise<void> {
    if (!this.running) return Promise.resolve();
    this.clear();
    this.running = false;
    log.debug({ registry: this.name }, 'Registry stopped');
    this.emit('exit', 'shutdown');
    return Promise.resolve();
  }

  kill(reason: Error = new Error('Registry killed')): void {
    if (!this.running) return;
    this.clear();
    this.running = false;
    log.warn({ registry: this.name, err: reason }, 'Registry terminated');
    this.emit('exit', reason);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Bind a name to a process until that process exits.
   *
   * @throws {RegistryUnavailableError} when the registry is not running
   * @throws {DuplicateRegistrationError} when the name is taken
   */
  register(name: string, proc: RegisteredProcess): ProcessAddress {
    if (!this.running) {
      throw new RegistryUnavailableError(this.name);
    }
    if (this.entries.has(name)) {
      throw new DuplicateRegistrationError(this.name, name);
    }

    const detach = onExit(proc, () => {
      this.unregister(name, proc);
    });
    this.entries.set(name, { proc, detach });
    log.debug({ registry: this.name, name }, 'Process registered');

    return this.via(name);
  }

  /**
   * Remove a name. With a process given, only removes the entry if it
   * still belongs to that process.
   */
  unregister(name: string, proc?: RegisteredProcess): boolean {
    const entry = this.entries.get(name);
    if (!entry || (proc && entry.proc !== proc)) {
      return false;
    }
    entry.detach();
    this.entries.delete(name);
    log.debug({ registry: this.name, name }, 'Process unregistered');
    return true;
  }

  whereis(name: string): RegisteredProcess | undefined {
    return this.entries.get(name)?.proc;
  }

  via(name: string): ProcessAddress {
    return {
      registry: this,
      name,
      whereis: () => this.whereis(name),
    };
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Send a frame to a registered process.
   *
   * @throws {ProcessNotFoundError} when nothing is registered under the name
   */
  async send(name: string, data: string): Promise<void> {
    const proc = this.whereis(name);
    if (!proc) {
      throw new ProcessNotFoundError(this.name, name);
    }
    await proc.send(data);
  }

  private clear(): void {
    for (const entry of this.entries.values()) {
      entry.detach();
    }
    this.entries.clear();
  }
}
