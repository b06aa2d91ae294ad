/**
 * Built-in retry handlers.
 */

import { NetworkError } from '../errors';
import { RetryContext, RetryHandler, RetryHandlerOptions } from './handler';
import { Jitter, RandomJitter } from './jitter';

export const DEFAULT_CONNECTION_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
];

/**
 * Retries connectivity failures (connection reset, remote disconnected)
 */
export class ConnectionErrorRetryHandler extends RetryHandler {
  readonly errorCodes: readonly string[];

  constructor(options: RetryHandlerOptions & { errorCodes?: readonly string[] } = {}) {
    super(options);
    this.errorCodes = options.errorCodes ?? DEFAULT_CONNECTION_ERROR_CODES;
  }

  protected canRetryCustom({ error }: RetryContext): boolean {
    const code = errorCodeOf(error);
    return code !== undefined && this.errorCodes.includes(code);
  }
}

/**
 * Retries HTTP 429, waiting as long as the server's Retry-After asks
 */
export class RateLimitErrorRetryHandler extends RetryHandler {
  readonly jitter: Jitter;

  constructor(options: RetryHandlerOptions & { jitter?: Jitter } = {}) {
    super(options);
    this.jitter = options.jitter ?? new RandomJitter();
  }

  protected canRetryCustom({ response }: RetryContext): boolean {
    return response?.status === 429;
  }

  computeDelay({ response }: RetryContext): number {
    const retryAfter = response ? retryAfterSeconds(response.headers) : undefined;
    return this.jitter.recalculate((retryAfter ?? 1) * 1000);
  }
}

/**
 * Retries server-side failures (HTTP 5xx)
 */
export class ServerErrorRetryHandler extends RetryHandler {
  protected canRetryCustom({ response }: RetryContext): boolean {
    return response !== undefined && response.status >= 500;
  }
}

/**
 * Read Retry-After (seconds) from response headers, whatever their case
 */
export function retryAfterSeconds(headers: Record<string, string>): number | undefined {
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'retry-after') {
      const seconds = parseInt(value, 10);
      return isNaN(seconds) || seconds < 0 ? undefined : seconds;
    }
  }
  return undefined;
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof NetworkError) {
    return error.errorCode;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Handlers used when a client is given none
 */
export function defaultRetryHandlers(): RetryHandler[] {
  return [new ConnectionErrorRetryHandler()];
}

/**
 * Every built-in handler that is safe to enable for all API calls
 */
export function allBuiltinRetryHandlers(): RetryHandler[] {
  return [new ConnectionErrorRetryHandler(), new RateLimitErrorRetryHandler()];
}
