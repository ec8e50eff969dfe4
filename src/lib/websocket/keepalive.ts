// Path: src/lib/websocket/keepalive.ts
// Ping/pong keepalive shared by every connection role

import { ManagedTimer } from '../../utils/timer.js';
import { WS_CONSTANTS } from './types.js';
import { wsLogger } from '../logger.js';
import type { Logger } from '../logger.js';

/**
 * Frames the keepalive policy needs to emit
 */
export interface KeepaliveSocket {
  ping(): void;
  pong(): void;
}

/**
 * Keepalive behavior attached to a connection's own event handling.
 * Message frames never pass through it.
 */
export interface KeepalivePolicy {
  /** Connection established: start the ping interval */
  handleConnect(): void;
  /** Inbound ping: reply with a pong */
  handlePing(): void;
  /** Inbound pong: liveness only */
  handlePong(): void;
  /** Cancel the ping interval */
  stop(): void;
  isActive(): boolean;
}

export interface KeepaliveOptions {
  intervalMs?: number;
  log?: Logger;
}

/**
 * Create the keepalive policy for one socket.
 *
 * The ping interval belongs to the connection that created the policy;
 * the connection stops it from its own termination path.
 */
export function createKeepalive(socket: KeepaliveSocket, options: KeepaliveOptions = {}): KeepalivePolicy {
  const timer = new ManagedTimer();
  const intervalMs = options.intervalMs ?? WS_CONSTANTS.KEEPALIVE_INTERVAL;
  const log = options.log ?? wsLogger;

  function sendPing(): void {
    try {
      socket.ping();
      log.trace('Sent keepalive ping');
    } catch (err) {
      log.warn({ err }, 'Failed to send keepalive ping');
    }
  }

  return {
    handleConnect(): void {
      timer.setInterval(sendPing, intervalMs);
    },
    handlePing(): void {
      socket.pong();
    },
    handlePong(): void {
      log.trace('Received keepalive pong');
    },
    stop(): void {
      timer.clear();
    },
    isActive(): boolean {
      return timer.isActive();
    },
  };
}
