/**
 * Tests for WebSocket sessions and the reconnecting base client.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Connection, ConnectionOptions, RealtimeClient, RealtimeClientOptions } from '../connection';
import { RealtimeError } from '../errors';
import { FakeWebSocketFactory, MemoryLogger } from '../mocks';
import { InMemoryMetrics, METRICS } from '../observability';
import { FixedValueRetryIntervalCalculator } from '../resilience';

describe('Connection', () => {
  let factory: FakeWebSocketFactory;
  let options: ConnectionOptions;
  let onMessage: ReturnType<typeof vi.fn>;
  let onClose: ReturnType<typeof vi.fn>;
  let onError: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    factory = new FakeWebSocketFactory();
    onMessage = vi.fn();
    onClose = vi.fn();
    onError = vi.fn();
    options = {
      url: 'wss://wss.example.com/link',
      pingInterval: 1000,
      connectTimeout: 1000,
      logger: new MemoryLogger(),
      webSocketFactory: factory.create,
      onMessage,
      onError,
      onClose,
    };
  });

  it('should resolve once the handshake completes', async () => {
    const connection = new Connection(options);

    await connection.connect();

    expect(factory.latest().url).toBe('wss://wss.example.com/link');
    expect(connection.isActive()).toBe(true);
    expect(connection.lastPingPongTime).toBeTypeOf('number');
  });

  it('should pass text frames on', async () => {
    const connection = new Connection(options);
    await connection.connect();

    factory.latest().receive({ type: 'hello' });

    expect(onMessage).toHaveBeenCalledWith('{"type":"hello"}');
  });

  it('should ping with its session id and record matching pongs', async () => {
    const connection = new Connection(options);
    await connection.connect();
    connection.lastPingPongTime = 0;

    connection.ping();

    const socket = factory.latest();
    expect(socket.pings).toHaveLength(1);
    expect(socket.pings[0].startsWith(`${connection.sessionId}:`)).toBe(true);
    await vi.waitFor(() => expect(connection.lastPingPongTime).toBeGreaterThan(0));
  });

  it('should ignore pongs of another session', async () => {
    const connection = new Connection(options);
    await connection.connect();
    connection.lastPingPongTime = 0;

    factory.latest().emit('pong', Buffer.from('another-session:1'));

    expect(connection.lastPingPongTime).toBe(0);
  });

  it('should terminate a session whose pongs stopped', async () => {
    const connection = new Connection(options);
    await connection.connect();
    connection.lastPingPongTime = Date.now() - 3 * options.pingInterval;

    connection.checkState();

    expect(factory.latest().readyState).toBe(3);
    expect(factory.latest().pings).toHaveLength(0);
    await vi.waitFor(() => expect(onClose).toHaveBeenCalledWith(1006, ''));
  });

  it('should ping a healthy session', async () => {
    const connection = new Connection(options);
    await connection.connect();

    connection.checkState();

    expect(factory.latest().pings).toHaveLength(1);
    expect(connection.isActive()).toBe(true);
  });

  it('should report server-side closes', async () => {
    const connection = new Connection(options);
    await connection.connect();

    factory.latest().drop(1001, 'going away');

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledWith(1001, 'going away'));
    expect(connection.isActive()).toBe(false);
  });

  it('should not report closes it asked for', async () => {
    const connection = new Connection(options);
    await connection.connect();

    connection.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(factory.latest().readyState).toBe(3);
    expect(onClose).not.toHaveBeenCalled();
  });

  it('should reject when the handshake fails', async () => {
    factory.autoOpen = false;
    const connection = new Connection(options);

    const connecting = connection.connect();
    factory.latest().fail('connection refused');

    await expect(connecting).rejects.toThrow('Realtime error: Connection failed: connection refused');
    await new Promise((resolve) => setImmediate(resolve));
    expect(onClose).not.toHaveBeenCalled();
    expect(onError).not.toHaveBeenCalled();
  });

  it('should give up on a slow handshake', async () => {
    factory.autoOpen = false;
    const connection = new Connection({ ...options, connectTimeout: 20 });

    await expect(connection.connect()).rejects.toThrow('handshake timed out after 20ms');
    expect(factory.latest().readyState).toBe(3);
  });

  it('should refuse to send before the handshake', () => {
    const connection = new Connection(options);
    expect(() => connection.send('hi')).toThrow(RealtimeError.notConnected());
  });
});

class TestClient extends RealtimeClient {
  protected readonly clientName = 'test';
  readonly handled: string[] = [];
  /** Outcomes of successive URL requests; a URL is made up when empty */
  readonly urls: (string | Error)[] = [];
  urlRequests = 0;

  protected async issueNewUrl(): Promise<string> {
    this.urlRequests++;
    const next = this.urls.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? `wss://wss.example.com/${this.urlRequests}`;
  }

  protected async handleMessage(message: string): Promise<void> {
    this.handled.push(message);
  }
}

describe('RealtimeClient', () => {
  let factory: FakeWebSocketFactory;
  let metrics: InMemoryMetrics;
  let client: TestClient;

  function createClient(options: RealtimeClientOptions = {}): TestClient {
    return new TestClient({
      logger: new MemoryLogger(),
      metrics,
      webSocketFactory: factory.create,
      reconnectInterval: new FixedValueRetryIntervalCalculator(0),
      sleep: () => Promise.resolve(),
      ...options,
    });
  }

  beforeEach(() => {
    factory = new FakeWebSocketFactory();
    metrics = new InMemoryMetrics();
    client = createClient();
  });

  afterEach(() => {
    client.close();
  });

  it('should connect to a newly issued URL', async () => {
    expect(client.getState()).toBe('disconnected');

    await client.connect();

    expect(client.getState()).toBe('connected');
    expect(client.isConnected()).toBe(true);
    expect(factory.latest().url).toBe('wss://wss.example.com/1');
    expect(client.sessionId).toBeDefined();
  });

  it('should share one in-flight connect between callers', async () => {
    await Promise.all([client.connectToNewEndpoint(), client.connectToNewEndpoint()]);

    expect(client.urlRequests).toBe(1);
    expect(factory.sockets).toHaveLength(1);
  });

  it('should keep a live connection unless forced', async () => {
    await client.connect();

    await client.connectToNewEndpoint(false);
    expect(factory.sockets).toHaveLength(1);

    await client.connectToNewEndpoint(true);
    expect(factory.sockets).toHaveLength(2);
    expect(factory.sockets[0].readyState).toBe(3);
  });

  it('should JSON-encode objects it sends', async () => {
    await client.connect();

    client.send({ type: 'ping', id: 1 });
    client.send('raw');

    expect(factory.latest().sent).toEqual(['{"type":"ping","id":1}', 'raw']);
  });

  it('should refuse to send while disconnected', () => {
    expect(() => client.send('hi')).toThrow(RealtimeError);
  });

  it('should run message listeners before handling a frame', async () => {
    const seen: string[] = [];
    client.onMessageListeners.push((message) => {
      seen.push(`listener:${message}`);
    });
    await client.connect();

    factory.latest().receive('frame');

    await vi.waitFor(() => expect(client.handled).toEqual(['frame']));
    expect(seen).toEqual(['listener:frame']);
    expect(metrics.getCounter(METRICS.REALTIME_MESSAGES, { client: 'test' })).toBe(1);
  });

  it('should reconnect after the server drops the connection', async () => {
    const onClose = vi.fn();
    client.onCloseListeners.push(onClose);
    const seen: string[] = [];
    client.onMessageListeners.push((message) => {
      seen.push(message);
    });
    await client.connect();

    factory.latest().drop(1006);

    await vi.waitFor(() => expect(factory.sockets).toHaveLength(2));
    await vi.waitFor(() => expect(client.getState()).toBe('connected'));
    expect(onClose).toHaveBeenCalledWith(1006, '');
    expect(factory.latest().url).toBe('wss://wss.example.com/2');
    expect(metrics.getCounter(METRICS.REALTIME_RECONNECTS, { client: 'test' })).toBe(1);

    factory.latest().receive('after reconnect');

    await vi.waitFor(() => expect(client.handled).toEqual(['after reconnect']));
    expect(seen).toEqual(['after reconnect']);
  });

  it('should keep the new session when the old one drops during a forced move', async () => {
    await client.connect();
    factory.autoOpen = false;

    const moving = client.connectToNewEndpoint(true);
    await vi.waitFor(() => expect(factory.sockets).toHaveLength(2));
    factory.sockets[0].drop(1006);
    await new Promise((resolve) => setImmediate(resolve));
    expect(client.getState()).not.toBe('disconnected');

    factory.sockets[1].open();
    await moving;
    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));

    expect(factory.sockets).toHaveLength(2);
    expect(factory.sockets[1].readyState).toBe(1);
    expect(client.getState()).toBe('connected');
    expect(client.urlRequests).toBe(2);
    expect(metrics.getCounter(METRICS.REALTIME_RECONNECTS, { client: 'test' })).toBe(0);
  });

  it('should abort a pending handshake on close()', async () => {
    factory.autoOpen = false;

    const connecting = client.connect();
    await vi.waitFor(() => expect(factory.sockets).toHaveLength(1));
    client.close();

    await expect(connecting).rejects.toThrow('closed during handshake');
    expect(factory.latest().readyState).toBe(3);
    expect(client.getState()).toBe('closed');
  });

  it('should give up after maxReconnectAttempts', async () => {
    client = createClient({ maxReconnectAttempts: 2 });
    const onError = vi.fn();
    client.onErrorListeners.push(onError);
    await client.connect();
    client.urls.push(new Error('url 1 failed'), new Error('url 2 failed'));

    factory.latest().drop(1006);

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    const [error] = onError.mock.calls[0];
    expect(error).toBeInstanceOf(RealtimeError);
    expect(error).toMatchObject({ message: 'Realtime error: Failed to reconnect after 2 attempts' });
    expect(client.urlRequests).toBe(3);
    expect(client.getState()).toBe('disconnected');
  });

  it('should not reconnect when autoReconnect is off', async () => {
    client = createClient({ autoReconnect: false });
    const onClose = vi.fn();
    client.onCloseListeners.push(onClose);
    await client.connect();

    factory.latest().drop(1006);

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(client.getState()).toBe('disconnected');
    expect(factory.sockets).toHaveLength(1);
  });

  it('should stay closed after close()', async () => {
    const onClose = vi.fn();
    client.onCloseListeners.push(onClose);
    await client.connect();

    client.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(client.getState()).toBe('closed');
    expect(factory.latest().readyState).toBe(3);
    expect(onClose).not.toHaveBeenCalled();
    expect(factory.sockets).toHaveLength(1);
  });

  it('should ping the connection from the monitor', async () => {
    client = createClient({ pingInterval: 20 });
    await client.connect();

    await vi.waitFor(() => expect(factory.latest().pings.length).toBeGreaterThan(0));
  });

  it('should surface a failed first connect', async () => {
    client.urls.push(new Error('apps.connections.open failed'));

    await expect(client.connect()).rejects.toThrow('apps.connections.open failed');
    expect(client.getState()).toBe('disconnected');
  });
});
