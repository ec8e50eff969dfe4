// Path: src/lib/websocket/keepalive.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createKeepalive } from './keepalive.js';

function createSocket() {
  return {
    ping: vi.fn(),
    pong: vi.fn(),
  };
}

describe('createKeepalive', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should ping every 30 seconds once connected', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    keepalive.handleConnect();
    expect(keepalive.isActive()).toBe(true);

    vi.advanceTimersByTime(29999);
    expect(socket.ping).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(socket.ping).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(30000);
    expect(socket.ping).toHaveBeenCalledTimes(2);
  });

  it('should not ping before connect', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    vi.advanceTimersByTime(120000);
    expect(socket.ping).not.toHaveBeenCalled();
    expect(keepalive.isActive()).toBe(false);
  });

  it('should stop pinging once stopped', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    keepalive.handleConnect();
    vi.advanceTimersByTime(30000);
    keepalive.stop();
    vi.advanceTimersByTime(90000);

    expect(socket.ping).toHaveBeenCalledTimes(1);
    expect(keepalive.isActive()).toBe(false);
  });

  it('should keep a single interval when connect is handled twice', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    keepalive.handleConnect();
    keepalive.handleConnect();
    vi.advanceTimersByTime(30000);

    expect(socket.ping).toHaveBeenCalledTimes(1);
  });

  it('should honor a custom interval', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket, { intervalMs: 1000 });

    keepalive.handleConnect();
    vi.advanceTimersByTime(3000);

    expect(socket.ping).toHaveBeenCalledTimes(3);
  });

  it('should answer a ping with a pong', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    keepalive.handlePing();

    expect(socket.pong).toHaveBeenCalledTimes(1);
    expect(socket.ping).not.toHaveBeenCalled();
  });

  it('should send nothing on pong', () => {
    const socket = createSocket();
    const keepalive = createKeepalive(socket);

    keepalive.handlePong();

    expect(socket.ping).not.toHaveBeenCalled();
    expect(socket.pong).not.toHaveBeenCalled();
  });

  it('should keep the interval when a ping fails', () => {
    const socket = createSocket();
    socket.ping.mockImplementation(() => {
      throw new Error('WebSocket is not open');
    });
    const keepalive = createKeepalive(socket);

    keepalive.handleConnect();
    vi.advanceTimersByTime(60000);

    expect(socket.ping).toHaveBeenCalledTimes(2);
    expect(keepalive.isActive()).toBe(true);
    keepalive.stop();
  });
});
