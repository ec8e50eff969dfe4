// Path: src/lib/process.ts
// Lifecycle contract shared by supervised processes

import type { EventEmitter } from 'node:events';

/**
 * Why a process exited: an orderly stop, or the error that killed it
 */
export type ExitReason = 'shutdown' | Error;

/**
 * A long-lived unit the supervisor can start, stop and restart.
 *
 * Emits exactly one `exit` event (with an {@link ExitReason}) per start,
 * whether stopped on request or terminated by a failure.
 */
export interface ManagedProcess extends EventEmitter {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Terminate abruptly, as a crash */
  kill(reason?: Error): void;
  isRunning(): boolean;
}

/**
 * A process that can be addressed through the registry
 */
export interface RegisteredProcess extends ManagedProcess {
  send(data: string): Promise<void>;
}

/**
 * Listen for the next exit of a process.
 *
 * @returns function that removes the listener
 */
export function onExit(proc: ManagedProcess, listener: (reason: ExitReason) => void): () => void {
  proc.once('exit', listener);
  return () => {
    proc.off('exit', listener);
  };
}

export function isAbnormalExit(reason: ExitReason): reason is Error {
  return reason !== 'shutdown';
}
