/**
 * Base class of the WebSocket clients (Socket Mode, RTM).
 *
 * Owns the current `Connection`, reconnects with backoff when it drops
 * unexpectedly, and pings it every `pingInterval` through a monitor timer.
 */

import { RealtimeError } from '../errors';
import { ConsoleLogger, Logger, METRICS, MetricsCollector, NoopMetrics } from '../observability';
import {
  BackoffRetryIntervalCalculator,
  RetryIntervalCalculator,
  Sleep,
  sleep as defaultSleep,
} from '../resilience';
import { Connection } from './connection';
import { WebSocketFactory } from './websocket';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closed';

export type MessageListener = (message: string) => void | Promise<void>;
export type ErrorListener = (error: Error) => void | Promise<void>;
export type CloseListener = (code: number, reason: string) => void | Promise<void>;

/**
 * Options shared by the real-time clients
 */
export interface RealtimeClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Heartbeat interval in ms */
  pingInterval?: number;
  /** Handshake timeout in ms */
  connectTimeout?: number;
  autoReconnect?: boolean;
  /** Consecutive failed reconnects before giving up */
  maxReconnectAttempts?: number;
  /** Delay before each reconnect attempt */
  reconnectInterval?: RetryIntervalCalculator;
  webSocketFactory?: WebSocketFactory;
  sleep?: Sleep;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export abstract class RealtimeClient {
  readonly onMessageListeners: MessageListener[] = [];
  readonly onErrorListeners: ErrorListener[] = [];
  readonly onCloseListeners: CloseListener[] = [];

  protected readonly logger: Logger;
  protected readonly metrics: MetricsCollector;
  protected readonly sleep: Sleep;
  readonly pingInterval: number;
  readonly connectTimeout: number;
  readonly autoReconnect: boolean;
  readonly maxReconnectAttempts: number;
  private readonly reconnectInterval: RetryIntervalCalculator;
  private readonly webSocketFactory?: WebSocketFactory;

  private state: ConnectionState = 'disconnected';
  private connection?: Connection;
  /** Connection whose handshake is still running */
  private pending?: Connection;
  private connecting?: Promise<void>;
  private monitor?: NodeJS.Timeout;
  private reconnectAttempts = 0;
  private reconnecting = false;
  private closed = false;

  /** Used in log lines and metric tags */
  protected abstract readonly clientName: string;

  constructor(options: RealtimeClientOptions = {}) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics ?? new NoopMetrics();
    this.sleep = options.sleep ?? defaultSleep;
    this.pingInterval = options.pingInterval ?? 5000;
    this.connectTimeout = options.connectTimeout ?? 30000;
    this.autoReconnect = options.autoReconnect ?? true;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
    this.reconnectInterval =
      options.reconnectInterval ?? new BackoffRetryIntervalCalculator({ backoffFactorMs: 500, maxDelayMs: 30000 });
    this.webSocketFactory = options.webSocketFactory;
  }

  /**
   * Fetch a fresh single-use WebSocket URL
   */
  protected abstract issueNewUrl(): Promise<string>;

  /**
   * Client-specific handling of a received text frame
   */
  protected abstract handleMessage(message: string): Promise<void>;

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.connection !== undefined && this.connection.isActive();
  }

  /**
   * Session id of the current connection
   */
  get sessionId(): string | undefined {
    return this.connection?.sessionId;
  }

  /**
   * Connect and start the heartbeat monitor
   */
  async connect(): Promise<void> {
    this.closed = false;
    await this.connectToNewEndpoint(false);
    this.startMonitor();
  }

  /**
   * Open a connection to a newly issued URL, replacing the current one.
   * Only one such operation runs at a time; concurrent callers share it.
   */
  connectToNewEndpoint(force = false): Promise<void> {
    if (this.connecting) {
      return this.connecting;
    }
    if (!force && this.isConnected()) {
      return Promise.resolve();
    }
    this.connecting = this.openConnection().finally(() => {
      this.connecting = undefined;
    });
    return this.connecting;
  }

  /**
   * Send a text frame; objects are JSON-encoded
   *
   * @throws {RealtimeError} when not connected
   */
  send(payload: string | object): void {
    if (!this.connection || !this.isConnected()) {
      throw RealtimeError.notConnected();
    }
    this.connection.send(typeof payload === 'string' ? payload : JSON.stringify(payload));
  }

  /**
   * Drop the current connection without reconnecting. `connect()` can be called again.
   */
  disconnect(): void {
    const connection = this.connection;
    this.connection = undefined;
    connection?.close();
    if (this.state !== 'closed') {
      this.setState('disconnected');
    }
  }

  /**
   * Stop the monitor and any reconnect loop, then close the connection
   */
  close(): void {
    this.closed = true;
    this.stopMonitor();
    this.pending?.close();
    this.disconnect();
    this.setState('closed');
  }

  protected isClosed(): boolean {
    return this.closed;
  }

  protected emitError(error: Error): void {
    for (const listener of this.onErrorListeners) {
      Promise.resolve()
        .then(() => listener(error))
        .catch((listenerError: unknown) => {
          this.logger.error(`${this.clientName} error listener failed`, { error: toError(listenerError).message });
        });
    }
  }

  private async openConnection(): Promise<void> {
    if (!this.reconnecting) {
      this.setState(this.connection ? 'reconnecting' : 'connecting');
    }

    try {
      const url = await this.issueNewUrl();
      const connection: Connection = new Connection({
        url,
        pingInterval: this.pingInterval,
        connectTimeout: this.connectTimeout,
        logger: this.logger,
        webSocketFactory: this.webSocketFactory,
        onMessage: (message) => this.onRawMessage(message),
        onError: (error) => this.emitError(error),
        onClose: (code, reason) => this.onConnectionClosed(connection, code, reason),
      });
      this.pending = connection;
      try {
        await connection.connect();
      } finally {
        this.pending = undefined;
      }

      if (this.closed) {
        connection.close();
        return;
      }

      const previous = this.connection;
      this.connection = connection;
      previous?.close();
      this.reconnectAttempts = 0;
      this.setState('connected');
      this.logger.info(`${this.clientName} connected`, { sessionId: connection.sessionId });
    } catch (error) {
      if (!this.reconnecting && !this.closed) {
        this.setState(this.connection?.isActive() ? 'connected' : 'disconnected');
      }
      throw error;
    }
  }

  private onRawMessage(message: string): void {
    this.metrics.increment(METRICS.REALTIME_MESSAGES, 1, { client: this.clientName });
    this.processMessage(message).catch((error: unknown) => {
      this.logger.error(`Failed to handle a ${this.clientName} message`, { error: toError(error).message });
      this.emitError(toError(error));
    });
  }

  private async processMessage(message: string): Promise<void> {
    for (const listener of this.onMessageListeners) {
      try {
        await listener(message);
      } catch (error) {
        this.logger.error(`${this.clientName} message listener failed`, { error: toError(error).message });
        this.emitError(toError(error));
      }
    }
    await this.handleMessage(message);
  }

  private onConnectionClosed(connection: Connection, code: number, reason: string): void {
    if (connection !== this.connection) {
      return;
    }
    this.logger.info(`${this.clientName} connection closed`, { code, reason });

    for (const listener of this.onCloseListeners) {
      Promise.resolve()
        .then(() => listener(code, reason))
        .catch((error: unknown) => {
          this.logger.error(`${this.clientName} close listener failed`, { error: toError(error).message });
        });
    }

    if (this.closed) {
      return;
    }
    if (!this.connecting) {
      this.setState('disconnected');
    }
    if (this.autoReconnect) {
      this.reconnect().catch((error: unknown) => this.emitError(toError(error)));
    }
  }

  private async reconnect(): Promise<void> {
    if (this.reconnecting) {
      return;
    }
    this.reconnecting = true;
    try {
      while (!this.closed) {
        await this.settlePendingConnect();
        if (this.closed || this.isConnected()) {
          return;
        }
        if (this.reconnectAttempts >= this.maxReconnectAttempts) {
          this.setState('disconnected');
          throw RealtimeError.reconnectFailed(this.reconnectAttempts);
        }

        const delay = this.reconnectInterval.calculateSleepDuration(this.reconnectAttempts);
        this.setState('reconnecting');
        this.logger.info(`Reconnecting ${this.clientName}`, { attempt: this.reconnectAttempts + 1, delay });
        await this.sleep(delay);
        if (this.closed || this.isConnected()) {
          return;
        }

        this.reconnectAttempts++;
        this.metrics.increment(METRICS.REALTIME_RECONNECTS, 1, { client: this.clientName });
        try {
          await this.connectToNewEndpoint(false);
          return;
        } catch (error) {
          this.logger.warn(`${this.clientName} reconnect attempt failed`, {
            attempt: this.reconnectAttempts,
            error: toError(error).message,
          });
        }
      }
    } finally {
      this.reconnecting = false;
    }
  }

  /**
   * Wait for a connect started elsewhere (a forced move to a new endpoint)
   */
  private async settlePendingConnect(): Promise<void> {
    if (!this.connecting) {
      return;
    }
    try {
      await this.connecting;
    } catch (error) {
      this.logger.debug(`${this.clientName} pending connect failed`, { error: toError(error).message });
    }
  }

  private startMonitor(): void {
    if (this.monitor) {
      return;
    }
    this.monitor = setInterval(() => this.monitorConnection(), this.pingInterval);
    this.monitor.unref();
  }

  private stopMonitor(): void {
    if (this.monitor) {
      clearInterval(this.monitor);
      this.monitor = undefined;
    }
  }

  private monitorConnection(): void {
    if (this.closed || this.connecting || this.reconnecting) {
      return;
    }
    this.connection?.checkState();
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.logger.debug(`${this.clientName} state changed`, { from: this.state, to: state });
      this.state = state;
    }
  }
}
