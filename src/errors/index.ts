/**
 * Error types for the Slack client.
 *
 * Three families reach callers: platform errors (`SlackApiError` and its
 * subclasses, carrying the `error` code Slack returned), HTTP errors
 * (`SlackHttpError`, a non-2xx response that is not a platform error) and
 * connectivity errors (`NetworkError`). Retry handlers decide which of them
 * are attempted again.
 */

/**
 * Base error class for Slack operations
 */
export abstract class SlackError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  /**
   * Get HTTP status code if applicable
   */
  get httpStatus(): number | undefined {
    return undefined;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends SlackError {
  readonly code = 'SLACK_CONFIG';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(`Configuration error: ${message}`);
  }
}

/**
 * Invalid request built on the client side (never sent)
 */
export class RequestError extends SlackError {
  readonly code = 'SLACK_REQUEST';
  readonly retryable = false;

  constructor(message: string) {
    super(`Request error: ${message}`);
  }
}

/**
 * Parsed body of a platform response, as far as errors need it
 */
export interface ErrorResponseBody {
  ok?: boolean;
  error?: string;
  needed?: string;
  provided?: string;
  response_metadata?: {
    messages?: string[];
  };
  [key: string]: unknown;
}

/**
 * Platform error: Slack answered with `ok: false`
 */
export class SlackApiError extends SlackError {
  readonly code: string = 'SLACK_API';
  readonly retryable: boolean = false;

  constructor(
    public readonly errorCode: string,
    public readonly response: ErrorResponseBody,
    public readonly statusCode: number = 200,
    message?: string
  ) {
    super(`The request to the Slack API failed (error: ${errorCode})${message ? `: ${message}` : ''}`);
  }

  get httpStatus(): number {
    return this.statusCode;
  }
}

/**
 * Token missing, invalid, revoked or expired
 */
export class AuthenticationError extends SlackApiError {
  readonly code = 'SLACK_AUTH';
}

/**
 * Token valid but not allowed to do this
 */
export class AuthorizationError extends SlackApiError {
  readonly code = 'SLACK_AUTHZ';

  /**
   * Scope the method needs, when Slack reported it
   */
  get neededScope(): string | undefined {
    return this.response.needed;
  }
}

/**
 * Arguments rejected by the platform
 */
export class InvalidArgumentsError extends SlackApiError {
  readonly code = 'SLACK_INVALID_ARGUMENTS';

  get messages(): string[] {
    return this.response.response_metadata?.messages ?? [];
  }
}

/**
 * Rate limited (HTTP 429, error `ratelimited`)
 */
export class RateLimitError extends SlackApiError {
  readonly code = 'SLACK_RATE_LIMIT';
  readonly retryable = true;

  constructor(
    response: ErrorResponseBody,
    /** Seconds to wait, from the Retry-After header */
    public readonly retryAfter: number,
    statusCode = 429
  ) {
    super(response.error ?? 'ratelimited', response, statusCode, `retry after ${retryAfter} seconds`);
  }
}

/**
 * Non-2xx HTTP response that does not carry a platform error
 */
export class SlackHttpError extends SlackError {
  readonly code = 'SLACK_HTTP';
  readonly retryable: boolean;

  constructor(
    public readonly statusCode: number,
    public readonly body: string,
    public readonly url?: string
  ) {
    super(`HTTP error: ${statusCode}${body ? ` ${truncate(body, 200)}` : ''}`);
    this.retryable = statusCode >= 500 || statusCode === 429;
  }

  get httpStatus(): number {
    return this.statusCode;
  }
}

/**
 * Network errors
 */
export class NetworkError extends SlackError {
  readonly code = 'SLACK_NETWORK';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly errorType: 'timeout' | 'connection',
    /** System error code such as ECONNRESET, when known */
    public readonly errorCode?: string
  ) {
    super(`Network error: ${message}`);
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError(`Request timed out after ${timeoutMs}ms`, 'timeout', 'ETIMEDOUT');
  }

  static connectionFailed(message: string, errorCode?: string): NetworkError {
    return new NetworkError(`Connection failed: ${message}`, 'connection', errorCode);
  }
}

/**
 * Response body could not be parsed
 */
export class ResponseError extends SlackError {
  readonly code = 'SLACK_RESPONSE';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly body?: string
  ) {
    super(`Response error: ${message}`);
  }
}

/**
 * Inbound request (webhook, slash command, events) rejected
 */
export class WebhookError extends SlackError {
  readonly code = 'SLACK_WEBHOOK';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly errorType: 'signature' | 'timestamp' | 'payload'
  ) {
    super(`Webhook error: ${message}`);
  }

  static invalidSignature(): WebhookError {
    return new WebhookError('Invalid signature', 'signature');
  }

  static expiredTimestamp(timestamp: string): WebhookError {
    return new WebhookError(`Timestamp is too old: ${timestamp}`, 'timestamp');
  }

  static invalidPayload(message: string): WebhookError {
    return new WebhookError(message, 'payload');
  }
}

/**
 * Socket Mode / RTM errors
 */
export class RealtimeError extends SlackError {
  readonly code = 'SLACK_REALTIME';
  readonly retryable: boolean;

  constructor(
    message: string,
    public readonly errorType: 'connection' | 'reconnect' | 'not_connected'
  ) {
    super(`Realtime error: ${message}`);
    this.retryable = errorType === 'connection';
  }

  static connectionFailed(message: string): RealtimeError {
    return new RealtimeError(`Connection failed: ${message}`, 'connection');
  }

  static reconnectFailed(attempts: number): RealtimeError {
    return new RealtimeError(`Failed to reconnect after ${attempts} attempts`, 'reconnect');
  }

  static notConnected(): RealtimeError {
    return new RealtimeError('The client is not connected to the Slack servers', 'not_connected');
  }
}

const AUTHENTICATION_CODES = new Set([
  'not_authed',
  'invalid_auth',
  'account_inactive',
  'token_revoked',
  'token_expired',
  'no_permission',
]);

const AUTHORIZATION_CODES = new Set([
  'missing_scope',
  'not_allowed_token_type',
  'ekm_access_denied',
  'access_denied',
]);

const ARGUMENT_CODES = new Set(['invalid_arguments', 'invalid_arg_name', 'invalid_form_data', 'invalid_json', 'json_not_object']);

/**
 * Create an error from a Slack API error response
 */
export function fromSlackError(
  code: string,
  response: ErrorResponseBody,
  statusCode = 200,
  retryAfter?: number
): SlackApiError {
  if (code === 'ratelimited' || code === 'rate_limited' || statusCode === 429) {
    return new RateLimitError(response, retryAfter ?? 1, statusCode);
  }
  if (AUTHENTICATION_CODES.has(code)) {
    return new AuthenticationError(code, response, statusCode);
  }
  if (AUTHORIZATION_CODES.has(code)) {
    const detail = response.needed ? `needed: ${response.needed}` : undefined;
    return new AuthorizationError(code, response, statusCode, detail);
  }
  if (ARGUMENT_CODES.has(code)) {
    const detail = response.response_metadata?.messages?.join('; ');
    return new InvalidArgumentsError(code, response, statusCode, detail);
  }
  return new SlackApiError(code, response, statusCode);
}

/**
 * Type guard for SlackError
 */
export function isSlackError(error: unknown): error is SlackError {
  return error instanceof SlackError;
}

/**
 * Type guard for platform errors
 */
export function isSlackApiError(error: unknown): error is SlackApiError {
  return error instanceof SlackApiError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  return isSlackError(error) && error.retryable;
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.substring(0, max)}...` : value;
}
