/**
 * One WebSocket session with ping/pong health tracking.
 */

import { randomUUID } from 'crypto';
import { RealtimeError } from '../errors';
import { Logger } from '../observability';
import { OPEN, WebSocketFactory, WebSocketLike, defaultWebSocketFactory, rawDataToString } from './websocket';

/**
 * Connection options
 */
export interface ConnectionOptions {
  url: string;
  /** Heartbeat interval in ms */
  pingInterval: number;
  /** Handshake timeout in ms */
  connectTimeout: number;
  logger: Logger;
  webSocketFactory?: WebSocketFactory;
  onMessage: (message: string) => void;
  onError: (error: Error) => void;
  /** Not called for closes the client itself asked for */
  onClose: (code: number, reason: string) => void;
}

export class Connection {
  readonly sessionId: string = randomUUID();
  /** Epoch ms of the last pong answering one of our pings */
  lastPingPongTime?: number;

  private socket?: WebSocketLike;
  private closedByClient = false;
  private closed = false;

  constructor(private readonly options: ConnectionOptions) {}

  /**
   * Open the socket; resolves once the handshake completes
   */
  connect(): Promise<void> {
    const { url, connectTimeout, logger } = this.options;
    const factory = this.options.webSocketFactory ?? defaultWebSocketFactory;
    const socket = factory(url);
    this.socket = socket;

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let opened = false;
      const fail = (message: string) => {
        settled = true;
        clearTimeout(timer);
        reject(RealtimeError.connectionFailed(message));
      };

      const timer = setTimeout(() => {
        if (settled) return;
        this.closedByClient = true;
        socket.terminate();
        fail(`handshake timed out after ${connectTimeout}ms`);
      }, connectTimeout);
      timer.unref();

      socket.on('open', () => {
        if (settled) return;
        settled = true;
        opened = true;
        clearTimeout(timer);
        this.lastPingPongTime = Date.now();
        logger.debug('WebSocket session opened', { sessionId: this.sessionId });
        resolve();
      });

      socket.on('error', (error) => {
        if (!settled) {
          fail(error.message);
          return;
        }
        if (!opened) {
          return;
        }
        logger.error('WebSocket session error', { sessionId: this.sessionId, error: error.message });
        this.options.onError(error);
      });

      socket.on('message', (data) => {
        this.options.onMessage(rawDataToString(data));
      });

      socket.on('pong', (data) => {
        this.handlePong(data.toString('utf8'));
      });

      socket.on('close', (code, reason) => {
        this.closed = true;
        if (!settled) {
          fail(`closed during handshake (code: ${code})`);
          return;
        }
        if (!opened) {
          return;
        }
        logger.debug('WebSocket session closed', { sessionId: this.sessionId, code, byClient: this.closedByClient });
        if (!this.closedByClient) {
          this.options.onClose(code, reason.toString('utf8'));
        }
      });
    });
  }

  isActive(): boolean {
    return this.socket !== undefined && !this.closed && this.socket.readyState === OPEN;
  }

  /**
   * @throws {RealtimeError} when the session is not open
   */
  send(message: string): void {
    if (!this.socket || !this.isActive()) {
      throw RealtimeError.notConnected();
    }
    this.socket.send(message);
  }

  /**
   * Ping with `<sessionId>:<epochMs>` so that our own pongs can be recognized
   */
  ping(): void {
    if (this.socket && this.isActive()) {
      this.socket.ping(`${this.sessionId}:${Date.now()}`);
    }
  }

  /**
   * Terminate a session whose pongs stopped arriving, otherwise ping it
   */
  checkState(): void {
    if (!this.socket || !this.isActive()) {
      return;
    }
    const last = this.lastPingPongTime;
    if (last !== undefined && Date.now() - last > this.options.pingInterval * 2) {
      this.options.logger.warn('No pong received in time, terminating the session', {
        sessionId: this.sessionId,
        lastPingPongTime: last,
      });
      this.socket.terminate();
      return;
    }
    this.ping();
  }

  close(): void {
    this.closedByClient = true;
    if (!this.socket || this.closed) {
      return;
    }
    if (this.socket.readyState === OPEN) {
      this.socket.close(1000);
    } else {
      this.socket.terminate();
    }
  }

  private handlePong(payload: string): void {
    if (payload.startsWith(`${this.sessionId}:`)) {
      this.lastPingPongTime = Date.now();
    } else {
      this.options.logger.debug('Ignored a pong from another session', { payload });
    }
  }
}
