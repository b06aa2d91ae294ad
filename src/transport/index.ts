/**
 * HTTP Transport layer shared by the Web API, webhook and realtime clients.
 */

import { fetch, ProxyAgent, type Dispatcher } from 'undici';
import { NetworkError } from '../errors';

export * from './proxy';
export * from './user-agent';

/**
 * HTTP methods the clients use
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * HTTP request options
 */
export interface RequestOptions {
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

/**
 * Complete outgoing request, as retry handlers see it
 */
export interface HttpRequest extends RequestOptions {
  url: string;
  headers: Record<string, string>;
}

/**
 * HTTP response. Header names are lower-cased; the body is left unparsed.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  request(url: string, options: RequestOptions): Promise<HttpResponse>;
}

/**
 * FetchTransport options
 */
export interface FetchTransportOptions {
  /** Request timeout in ms */
  defaultTimeout?: number;
  /** Proxy URL (e.g. http://localhost:9000) */
  proxy?: string;
}

/**
 * Default transport built on undici's fetch
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: FetchTransportOptions = {}) {
    this.defaultTimeout = options.defaultTimeout ?? 30000;
    if (options.proxy) {
      this.dispatcher = new ProxyAgent(options.proxy);
    }
  }

  async request(url: string, options: RequestOptions): Promise<HttpResponse> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: options.method,
        headers: options.headers,
        body: options.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw NetworkError.timeout(timeout);
        }
        const code = systemErrorCode(error);
        const detail = error.cause instanceof Error ? error.cause.message : error.message;
        throw NetworkError.connectionFailed(detail, code);
      }
      throw NetworkError.connectionFailed(String(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Find the system error code (ECONNRESET, UND_ERR_SOCKET, ...) behind a fetch failure
 */
export function systemErrorCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Create the default transport
 */
export function createTransport(options: FetchTransportOptions = {}): HttpTransport {
  return new FetchTransport(options);
}
