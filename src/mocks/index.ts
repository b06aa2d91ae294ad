/**
 * In-process stand-ins for the network, for tests.
 */

import { EventEmitter } from 'events';
import { WebSocketFactory, WebSocketLike } from '../connection';
import { LogLevel, Logger } from '../observability';
import { HttpResponse, HttpTransport, RequestOptions } from '../transport';

/**
 * Mock response configuration
 */
export interface MockResponse {
  /** JSON-encoded into the body */
  data?: unknown;
  /** Sent as is, instead of `data` */
  rawBody?: string;
  status?: number;
  headers?: Record<string, string>;
  delay?: number;
}

/**
 * Mock request matcher
 */
export interface MockMatcher {
  url?: string | RegExp;
  method?: string;
}

/**
 * A recorded request
 */
export interface MockCall {
  url: string;
  options: RequestOptions;
}

type MockOutcome = { response: MockResponse } | { error: unknown };

interface MockEntry {
  matcher: MockMatcher;
  outcome: MockOutcome;
}

/**
 * Mock HTTP transport for testing.
 *
 * One-shot entries (`mockOnce`, `mockError`) are used first, in the order
 * they were added; persistent entries (`mock`) answer every matching call.
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: MockEntry[] = [];
  private queue: MockEntry[] = [];
  private calls: MockCall[] = [];
  private defaultResponse: MockResponse = { data: { ok: true }, status: 200, headers: {} };

  /**
   * Add a persistent mock response
   */
  mock(matcher: MockMatcher | string, response: MockResponse): this {
    this.mocks.push({ matcher: normalize(matcher), outcome: { response } });
    return this;
  }

  /**
   * Add a response used for a single call
   */
  mockOnce(matcher: MockMatcher | string, response: MockResponse): this {
    this.queue.push({ matcher: normalize(matcher), outcome: { response } });
    return this;
  }

  /**
   * Make the next matching call throw
   */
  mockError(matcher: MockMatcher | string, error: unknown): this {
    this.queue.push({ matcher: normalize(matcher), outcome: { error } });
    return this;
  }

  setDefaultResponse(response: MockResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Get all calls made
   */
  getCalls(): MockCall[] {
    return this.calls;
  }

  /**
   * Get calls matching a URL
   */
  getCallsTo(url: string | RegExp): MockCall[] {
    return this.calls.filter((call) => matchesUrl(call.url, url));
  }

  /**
   * Clear all mocks and calls
   */
  reset(): this {
    this.mocks = [];
    this.queue = [];
    this.calls = [];
    return this;
  }

  async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    this.calls.push({ url, options });

    const queued = this.queue.findIndex(({ matcher }) => matches(matcher, url, options));
    const entry = queued !== -1 ? this.queue.splice(queued, 1)[0] : this.mocks.find(({ matcher }) => matches(matcher, url, options));
    const outcome: MockOutcome = entry?.outcome ?? { response: this.defaultResponse };

    if ('error' in outcome) {
      throw outcome.error;
    }

    const response = outcome.response;
    if (response.delay) {
      await new Promise((resolve) => setTimeout(resolve, response.delay));
    }

    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      body: response.rawBody ?? JSON.stringify(response.data ?? { ok: true }),
    };
  }
}

function normalize(matcher: MockMatcher | string): MockMatcher {
  return typeof matcher === 'string' ? { url: matcher } : matcher;
}

function matchesUrl(url: string, pattern: string | RegExp): boolean {
  return typeof pattern === 'string' ? url.includes(pattern) : pattern.test(url);
}

function matches(matcher: MockMatcher, url: string, options: RequestOptions): boolean {
  if (matcher.url && !matchesUrl(url, matcher.url)) {
    return false;
  }
  return !matcher.method || options.method === matcher.method;
}

/**
 * Create mock transport
 */
export function createMockTransport(): MockHttpTransport {
  return new MockHttpTransport();
}

/**
 * WebSocket double driven from the test side
 */
export class FakeWebSocket extends EventEmitter implements WebSocketLike {
  readyState = 0;
  /** Text frames sent by the client */
  readonly sent: string[] = [];
  /** Ping payloads sent by the client */
  readonly pings: string[] = [];
  /** Answer pings with a matching pong */
  autoPong = true;

  constructor(
    readonly url: string,
    options: { autoOpen?: boolean } = {}
  ) {
    super();
    if (options.autoOpen ?? true) {
      setImmediate(() => this.open());
    }
  }

  /**
   * Complete the handshake
   */
  open(): void {
    if (this.readyState !== 0) return;
    this.readyState = 1;
    this.emit('open');
  }

  /**
   * Deliver a frame from the server
   */
  receive(data: string | object): void {
    const text = typeof data === 'string' ? data : JSON.stringify(data);
    this.emit('message', Buffer.from(text), false);
  }

  /**
   * Close from the server side
   */
  drop(code = 1006, reason = ''): void {
    this.finish(code, reason);
  }

  /**
   * Fail the handshake
   */
  fail(message: string): void {
    this.emit('error', new Error(message));
    this.finish(1006, '');
  }

  /**
   * Frames sent by the client, JSON-decoded
   */
  sentJson(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  send(data: string): void {
    if (this.readyState !== 1) {
      throw new Error('WebSocket is not open');
    }
    this.sent.push(data);
  }

  ping(data = ''): void {
    this.pings.push(data);
    if (this.autoPong) {
      setImmediate(() => this.emit('pong', Buffer.from(data)));
    }
  }

  close(code = 1000, reason = ''): void {
    this.finish(code, reason);
  }

  terminate(): void {
    this.finish(1006, '');
  }

  private finish(code: number, reason: string): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    setImmediate(() => this.emit('close', code, Buffer.from(reason)));
  }
}

/**
 * Creates FakeWebSockets and keeps them for inspection
 */
export class FakeWebSocketFactory {
  readonly sockets: FakeWebSocket[] = [];
  autoOpen = true;

  readonly create: WebSocketFactory = (url) => {
    const socket = new FakeWebSocket(url, { autoOpen: this.autoOpen });
    this.sockets.push(socket);
    return socket;
  };

  /**
   * Most recently created socket
   */
  latest(): FakeWebSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No WebSocket has been created');
    }
    return socket;
  }
}

/**
 * A recorded log line
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every line in memory
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context });
  }

  /**
   * Entries at one level
   */
  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}
