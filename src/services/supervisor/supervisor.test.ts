// Path: src/services/supervisor/supervisor.test.ts

import { EventEmitter, once } from 'node:events';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ClientSupervisor, startClient } from './supervisor.js';
import type { ClientConfig, ClientMessage, ProcessFactory } from './types.js';
import type { ConnectionArgs } from '../../lib/websocket/client.js';
import type { RegisteredProcess } from '../../lib/process.js';
import { ClientError, DuplicateRegistrationError } from '../../utils/error.js';

// Stand-in for a gateway connection: registers on start like the real one
class FakeConnection extends EventEmitter implements RegisteredProcess {
  readonly name: string;
  readonly sent: string[] = [];
  private running = false;

  constructor(readonly args: ConnectionArgs) {
    super();
    this.name = args.name;
  }

  async start(): Promise<void> {
    const failure = failStart?.(this.name);
    if (failure) throw failure;
    this.args.registry.register(this.name, this);
    this.running = true;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    stopped.push(this.name);
    this.emit('exit', 'shutdown');
  }

  kill(reason: Error = new Error('killed')): void {
    if (!this.running) return;
    this.running = false;
    this.emit('exit', reason);
  }

  isRunning(): boolean {
    return this.running;
  }

  send(data: string): Promise<void> {
    this.sent.push(data);
    return Promise.resolve();
  }
}

let created: FakeConnection[];
let stopped: string[];
let failStart: ((name: string) => Error | undefined) | undefined;

const processFactory: ProcessFactory = (args) => {
  const connection = new FakeConnection(args);
  created.push(connection);
  return connection;
};

const topic = { tenant: 't', namespace: 'n' };

const config: ClientConfig = {
  host: 'broker:8080',
  producer: [
    { ...topic, topic: 'orders' },
    { ...topic, topic: 'payments' },
  ],
  consumer: { ...topic, topic: 'orders', subscription: 'sub1' },
  reader: { ...topic, topic: 'audit' },
};

function current(supervisor: ClientSupervisor, id: string): FakeConnection {
  const proc = supervisor.getChild(id)?.process;
  const connection = created.find(c => c === proc);
  if (!connection) throw new Error(`no running connection for ${id}`);
  return connection;
}

function snapshot(supervisor: ClientSupervisor): Record<string, FakeConnection> {
  const ids = ['producer:0', 'producer:1', 'consumer', 'reader'];
  return Object.fromEntries(ids.map(id => [id, current(supervisor, id)]));
}

async function nextRestart(supervisor: ClientSupervisor): Promise<unknown[]> {
  const args: unknown[] = await once(supervisor, 'child_restarted');
  return args;
}

describe('ClientSupervisor', () => {
  let supervisor: ClientSupervisor;

  beforeEach(() => {
    created = [];
    stopped = [];
    failStart = undefined;
    supervisor = new ClientSupervisor(config, { processFactory });
  });

  afterEach(async () => {
    await supervisor.stop();
  });

  it('should start children in plan order', async () => {
    let startedEvents = 0;
    supervisor.on('started', () => { startedEvents++; });

    await supervisor.start();

    expect(supervisor.getState()).toBe('running');
    expect(startedEvents).toBe(1);
    expect(created.map(c => c.name)).toEqual(['producer:0', 'producer:1', 'consumer', 'reader']);
    expect(supervisor.registry.isRunning()).toBe(true);
    expect(supervisor.registry.names()).toEqual(['producer:0', 'producer:1', 'consumer', 'reader']);
    expect(supervisor.whichChildren().map(c => [c.id, c.status])).toEqual([
      ['registry', 'running'],
      ['producer:0', 'running'],
      ['producer:1', 'running'],
      ['consumer', 'running'],
      ['reader', 'running'],
    ]);
  });

  it('should hand the live registry and merged args to each connection', async () => {
    await supervisor.start();

    const consumer = current(supervisor, 'consumer');
    expect(consumer.args.registry).toBe(supervisor.registry);
    expect(consumer.args).toMatchObject({
      role: 'consumer',
      name: 'consumer',
      host: 'broker:8080',
      protocol: 'ws',
      subscription: 'sub1',
      transportOptions: [],
    });
  });

  it('should restart only the last child when it crashes', async () => {
    await supervisor.start();
    const before = snapshot(supervisor);

    const restarted = nextRestart(supervisor);
    before.reader.kill(new Error('socket closed'));
    const [id, reason] = await restarted;

    expect(id).toBe('reader');
    expect(reason).toHaveProperty('message', 'socket closed');
    const after = snapshot(supervisor);
    expect(after['producer:0']).toBe(before['producer:0']);
    expect(after['producer:1']).toBe(before['producer:1']);
    expect(after.consumer).toBe(before.consumer);
    expect(after.reader).not.toBe(before.reader);
    expect(stopped).toEqual([]);
    expect(supervisor.getChild('reader')?.restartCount).toBe(1);
  });

  it('should restart only a crashed producer and leave later children running', async () => {
    await supervisor.start();
    const before = snapshot(supervisor);

    const restarted = nextRestart(supervisor);
    before['producer:1'].kill();
    const [id] = await restarted;

    expect(id).toBe('producer:1');
    const after = snapshot(supervisor);
    expect(after['producer:0']).toBe(before['producer:0']);
    expect(after['producer:1']).not.toBe(before['producer:1']);
    expect(after.consumer).toBe(before.consumer);
    expect(after.reader).toBe(before.reader);
    expect(stopped).toEqual([]);
    expect(supervisor.whichChildren().map(c => c.restartCount)).toEqual([0, 0, 1, 0, 0]);
    expect(supervisor.registry.whereis('producer:1')).toBe(after['producer:1']);
  });

  it('should keep the consumer connection when its single producer crashes', async () => {
    supervisor = new ClientSupervisor(
      {
        host: 'broker:8080',
        producer: { ...topic, topic: 'orders' },
        consumer: { ...topic, topic: 'orders', subscription: 'sub1' },
      },
      { processFactory }
    );
    await supervisor.start();
    const producer = current(supervisor, 'producer');
    const consumer = current(supervisor, 'consumer');

    const restarted = nextRestart(supervisor);
    producer.kill(new Error('socket closed'));
    await restarted;

    expect(current(supervisor, 'producer')).not.toBe(producer);
    expect(current(supervisor, 'consumer')).toBe(consumer);
    expect(consumer.isRunning()).toBe(true);
    expect(stopped).toEqual([]);
    expect(created).toHaveLength(3);
  });

  it('should restart every connection when the registry crashes', async () => {
    await supervisor.start();
    const before = snapshot(supervisor);
    const registry = supervisor.registry;

    const restarted = nextRestart(supervisor);
    registry.kill(new Error('registry crashed'));
    const [id] = await restarted;

    expect(id).toBe('registry');
    expect(stopped).toEqual(['reader', 'consumer', 'producer:1', 'producer:0']);
    expect(supervisor.registry).toBe(registry);
    expect(registry.isRunning()).toBe(true);

    const after = snapshot(supervisor);
    for (const name of Object.keys(before)) {
      expect(after[name]).not.toBe(before[name]);
      expect(registry.whereis(name)).toBe(after[name]);
    }
    expect(supervisor.getChild('registry')?.restartCount).toBe(1);
  });

  it('should restart a child that exits normally on its own', async () => {
    await supervisor.start();

    const restarted = nextRestart(supervisor);
    await current(supervisor, 'consumer').stop();
    const [id, reason] = await restarted;

    expect(id).toBe('consumer');
    expect(reason).toBe('shutdown');
    expect(current(supervisor, 'consumer').isRunning()).toBe(true);
  });

  it('should retry a child that fails to restart', async () => {
    await supervisor.start();
    let failures = 1;
    failStart = (name) => (name === 'reader' && failures-- > 0 ? new Error('connect ECONNREFUSED') : undefined);

    const restarted = nextRestart(supervisor);
    current(supervisor, 'reader').kill();
    const [id, reason] = await restarted;

    expect(id).toBe('reader');
    expect(reason).toHaveProperty('message', 'connect ECONNREFUSED');
    expect(created).toHaveLength(6);
    expect(supervisor.getChild('reader')).toMatchObject({ status: 'running', restartCount: 1 });
    expect(supervisor.getState()).toBe('running');
  });

  it('should fail when a restarted child finds its name taken', async () => {
    await supervisor.start();
    const producer = current(supervisor, 'producer:0');
    const failed = once(supervisor, 'error');

    producer.kill();
    // Claims the name before the restart runs
    supervisor.registry.register('producer:0', new FakeConnection(producer.args));
    const [err]: unknown[] = await failed;

    expect(err).toBeInstanceOf(DuplicateRegistrationError);
    expect(supervisor.getState()).toBe('failed');
    expect(supervisor.registry.isRunning()).toBe(false);
    expect(supervisor.whichChildren().every(c => c.process === null)).toBe(true);
  });

  it('should shut down started children when one fails to start', async () => {
    failStart = (name) => (name === 'consumer' ? new Error('connect ECONNREFUSED') : undefined);

    const err: unknown = await supervisor.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ClientError);
    expect(err).toHaveProperty('code', 'CHILD_START_FAILURE');
    expect(err).toHaveProperty('message', 'connect ECONNREFUSED');
    expect(supervisor.getState()).toBe('failed');
    expect(stopped).toEqual(['producer:1', 'producer:0']);
    expect(supervisor.registry.isRunning()).toBe(false);
    expect(created).toHaveLength(3);
  });

  it('should stop children last first', async () => {
    await supervisor.start();
    let stoppedEvents = 0;
    supervisor.on('stopped', () => { stoppedEvents++; });

    await supervisor.stop();
    await supervisor.stop();

    expect(supervisor.getState()).toBe('stopped');
    expect(stopped).toEqual(['reader', 'consumer', 'producer:1', 'producer:0']);
    expect(stoppedEvents).toBe(1);
    expect(supervisor.registry.isRunning()).toBe(false);
    expect(supervisor.whichChildren().every(c => c.status === 'stopped' && c.process === null)).toBe(true);
  });

  it('should drop a pending restart when stopped', async () => {
    await supervisor.start();

    current(supervisor, 'reader').kill();
    await supervisor.stop();

    expect(created).toHaveLength(4);
    expect(supervisor.getState()).toBe('stopped');
  });

  it('should refuse to start twice', async () => {
    await supervisor.start();
    await expect(supervisor.start()).rejects.toThrow('was already started');
  });

  it('should forward inbound messages with their child id', async () => {
    await supervisor.start();
    const messages: ClientMessage[] = [];
    supervisor.on('message', (message: ClientMessage) => messages.push(message));

    current(supervisor, 'consumer').emit('message', '{"messageId":"CAAQAw=="}');

    expect(messages).toEqual([{ child: 'consumer', role: 'consumer', data: '{"messageId":"CAAQAw=="}' }]);
  });

  it('should send to a connection by name', async () => {
    await supervisor.start();

    await supervisor.send('producer:1', '{"payload":"aGk="}');

    expect(current(supervisor, 'producer:1').sent).toEqual(['{"payload":"aGk="}']);
  });
});

describe('startClient', () => {
  beforeEach(() => {
    created = [];
    stopped = [];
    failStart = undefined;
  });

  it('should return a running supervisor', async () => {
    const client = await startClient(
      { host: 'broker:8080', producer: { ...topic, topic: 'orders' } },
      { processFactory }
    );

    expect(client.getState()).toBe('running');
    expect(client.name).toBe('default-supervisor');
    expect(client.whichChildren().map(c => c.id)).toEqual(['registry', 'producer']);

    await client.stop();
  });
});
