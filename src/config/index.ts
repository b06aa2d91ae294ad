/**
 * Configuration management for the Slack clients.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { LOG_LEVELS, LogLevel, Logger } from '../observability';
import { loadProxyFromEnv } from '../transport';
import {
  BackoffRetryIntervalCalculator,
  ConnectionErrorRetryHandler,
  RateLimitErrorRetryHandler,
  RetryHandler,
  ServerErrorRetryHandler,
  Sleep,
} from '../resilience';

/** Default Web API base URL */
export const DEFAULT_BASE_URL = 'https://slack.com/api/';

/** Default request timeout in ms */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Token types
 */
export type TokenType = 'bot' | 'user' | 'app';

/**
 * Detect token type from prefix
 */
export function detectTokenType(token: string): TokenType {
  if (token.startsWith('xoxb-')) return 'bot';
  if (token.startsWith('xoxp-')) return 'user';
  if (token.startsWith('xapp-')) return 'app';
  throw new ConfigurationError('Token must start with xoxb-, xoxp-, or xapp-');
}

/**
 * Slack token wrapper
 */
export interface SlackToken {
  readonly value: string;
  readonly type: TokenType;
}

/**
 * Create a slack token
 */
export function createToken(token: string): SlackToken {
  return { value: token, type: detectTokenType(token) };
}

/**
 * Retry configuration for HTTP calls
 */
export interface RetryConfig {
  /** Retries granted by each handler */
  maxRetryCount: number;
  /** Base backoff interval in ms */
  backoffFactorMs: number;
  /** Cap on the backoff interval in ms */
  maxDelayMs: number;
  /** Retry HTTP 429 after Retry-After */
  rateLimitRetries: boolean;
  /** Retry HTTP 5xx */
  serverErrorRetries: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetryCount: 1,
  backoffFactorMs: 500,
  maxDelayMs: 60000,
  rateLimitRetries: false,
  serverErrorRetries: false,
};

/**
 * Real-time (Socket Mode / RTM) connection configuration
 */
export interface RealtimeConfig {
  /** Heartbeat interval in ms */
  pingInterval: number;
  /** Time allowed for the WebSocket handshake in ms */
  connectTimeout: number;
  autoReconnect: boolean;
  /** Consecutive failed reconnects before giving up */
  maxReconnectAttempts: number;
}

export const DEFAULT_REALTIME_CONFIG: RealtimeConfig = {
  pingInterval: 5000,
  connectTimeout: 30000,
  autoReconnect: true,
  maxReconnectAttempts: 10,
};

/**
 * Slack client configuration
 */
export interface SlackConfig {
  /** Bot token (xoxb-*) */
  botToken?: SlackToken;
  /** User token (xoxp-*) */
  userToken?: SlackToken;
  /** App-level token (xapp-*) for Socket Mode */
  appToken?: SlackToken;
  /** Signing secret for request verification */
  signingSecret?: string;
  baseUrl: string;
  /** Request timeout in ms */
  timeout: number;
  defaultHeaders: Record<string, string>;
  /** HTTP(S) proxy URL */
  proxy?: string;
  logLevel: LogLevel;
  /** Whether the app runs over Socket Mode (requires an app token) */
  socketMode: boolean;
  retry: RetryConfig;
  realtime: RealtimeConfig;
}

/**
 * Create a default configuration
 */
export function createDefaultConfig(): SlackConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeout: DEFAULT_TIMEOUT,
    defaultHeaders: {},
    logLevel: 'info',
    socketMode: false,
    retry: { ...DEFAULT_RETRY_CONFIG },
    realtime: { ...DEFAULT_REALTIME_CONFIG },
  };
}

const configSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().int().positive(),
  proxy: z.string().url().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  retry: z.object({
    maxRetryCount: z.number().int().nonnegative(),
    backoffFactorMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    rateLimitRetries: z.boolean(),
    serverErrorRetries: z.boolean(),
  }),
  realtime: z.object({
    pingInterval: z.number().int().positive(),
    connectTimeout: z.number().int().positive(),
    autoReconnect: z.boolean(),
    maxReconnectAttempts: z.number().int().nonnegative(),
  }),
});

/**
 * Validate a configuration.
 *
 * @throws {ConfigurationError} listing every problem found
 */
export function validateConfig(config: SlackConfig): void {
  const issues: string[] = [];

  const result = configSchema.safeParse(config);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  if (!config.botToken && !config.userToken) {
    issues.push('At least one token (bot or user) is required');
  }
  if (config.socketMode && !config.appToken) {
    issues.push('App token is required for Socket Mode');
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues.join('; '), issues);
  }
}

/**
 * Builder for SlackConfig
 */
export class SlackConfigBuilder {
  private config: SlackConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  botToken(token: string): this {
    this.config.botToken = createToken(token);
    return this;
  }

  userToken(token: string): this {
    this.config.userToken = createToken(token);
    return this;
  }

  appToken(token: string): this {
    this.config.appToken = createToken(token);
    return this;
  }

  signingSecret(secret: string): this {
    this.config.signingSecret = secret;
    return this;
  }

  baseUrl(url: string): this {
    this.config.baseUrl = url;
    return this;
  }

  /**
   * Set request timeout in ms
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  defaultHeader(name: string, value: string): this {
    this.config.defaultHeaders[name] = value;
    return this;
  }

  proxy(url: string): this {
    this.config.proxy = url;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Shorthand for the retry count of every handler
   */
  maxRetries(n: number): this {
    this.config.retry.maxRetryCount = n;
    return this;
  }

  retry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  realtime(config: Partial<RealtimeConfig>): this {
    this.config.realtime = { ...this.config.realtime, ...config };
    return this;
  }

  /**
   * Require an app token at build time
   */
  enableSocketMode(): this {
    this.config.socketMode = true;
    return this;
  }

  /**
   * Build the configuration (with validation)
   */
  build(): SlackConfig {
    validateConfig(this.config);
    return this.snapshot();
  }

  /**
   * Build without validation (for testing)
   */
  buildUnchecked(): SlackConfig {
    return this.snapshot();
  }

  private snapshot(): SlackConfig {
    return {
      ...this.config,
      defaultHeaders: { ...this.config.defaultHeaders },
      retry: { ...this.config.retry },
      realtime: { ...this.config.realtime },
    };
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const n = parseInt(value, 10);
  return isNaN(n) ? undefined : n;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value.toLowerCase());
  if (!level) {
    throw new ConfigurationError(`Unknown log level: ${value}`, [`logLevel: ${value}`]);
  }
  return level;
}

/**
 * Create configuration from environment variables
 */
export function createConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): SlackConfig {
  const builder = new SlackConfigBuilder();

  if (env.SLACK_BOT_TOKEN) builder.botToken(env.SLACK_BOT_TOKEN);
  if (env.SLACK_USER_TOKEN) builder.userToken(env.SLACK_USER_TOKEN);
  if (env.SLACK_APP_TOKEN) builder.appToken(env.SLACK_APP_TOKEN);
  if (env.SLACK_SIGNING_SECRET) builder.signingSecret(env.SLACK_SIGNING_SECRET);
  if (env.SLACK_BASE_URL) builder.baseUrl(env.SLACK_BASE_URL);
  if (env.SLACK_LOG_LEVEL) builder.logLevel(parseLogLevel(env.SLACK_LOG_LEVEL));

  const timeout = parseInteger(env.SLACK_TIMEOUT);
  if (timeout !== undefined) builder.timeout(timeout);

  const maxRetries = parseInteger(env.SLACK_MAX_RETRIES);
  if (maxRetries !== undefined) builder.maxRetries(maxRetries);

  const proxy = loadProxyFromEnv(logger, env);
  if (proxy) builder.proxy(proxy);

  return builder.build();
}

/**
 * Turn the retry section into a handler chain.
 *
 * The connection handler is always present; the rate-limit and server-error
 * handlers are opt-in.
 */
export function retryHandlersFromConfig(retry: RetryConfig, sleep?: Sleep): RetryHandler[] {
  const intervalCalculator = new BackoffRetryIntervalCalculator({
    backoffFactorMs: retry.backoffFactorMs,
    maxDelayMs: retry.maxDelayMs,
  });
  const options = { maxRetryCount: retry.maxRetryCount, intervalCalculator, sleep };

  const handlers: RetryHandler[] = [new ConnectionErrorRetryHandler(options)];
  if (retry.rateLimitRetries) {
    handlers.push(new RateLimitErrorRetryHandler({ maxRetryCount: retry.maxRetryCount, sleep }));
  }
  if (retry.serverErrorRetries) {
    handlers.push(new ServerErrorRetryHandler(options));
  }
  return handlers;
}
