/**
 * Incoming Webhooks, response_url replies and inbound request handling.
 */

import { z } from 'zod';
import { Clock, SignatureVerifier } from '../auth';
import { SlackHttpError, WebhookError } from '../errors';
import { EventDispatcher } from '../events';
import { Logger, MetricsCollector, NoopLogger, NoopMetrics } from '../observability';
import { RetryHandler, defaultRetryHandlers, sendWithRetries } from '../resilience';
import { HttpTransport, buildUserAgent, createTransport } from '../transport';
import { Attachment, Block } from '../types';

/**
 * Message sent to an Incoming Webhook or a response_url
 */
export interface WebhookMessage {
  text?: string;
  blocks?: Block[];
  attachments?: Attachment[];
  thread_ts?: string;
  /** response_url only */
  response_type?: 'in_channel' | 'ephemeral';
  /** response_url only */
  replace_original?: boolean;
  /** response_url only */
  delete_original?: boolean;
  unfurl_links?: boolean;
  unfurl_media?: boolean;
  metadata?: Record<string, unknown>;
}

/**
 * What the webhook endpoint answered
 */
export interface WebhookResponse {
  url: string;
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * WebhookClient options
 */
export interface WebhookClientOptions {
  /** Request timeout in ms */
  timeout?: number;
  proxy?: string;
  defaultHeaders?: Record<string, string>;
  transport?: HttpTransport;
  retryHandlers?: RetryHandler[];
  logger?: Logger;
  metrics?: MetricsCollector;
  userAgentPrefix?: string;
  userAgentSuffix?: string;
}

/**
 * Client for one Incoming Webhook or response_url
 */
export class WebhookClient {
  private readonly transport: HttpTransport;
  private readonly retryHandlers: RetryHandler[];
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeout: number;

  constructor(
    readonly url: string,
    options: WebhookClientOptions = {}
  ) {
    this.timeout = options.timeout ?? 30000;
    this.transport =
      options.transport ?? createTransport({ defaultTimeout: this.timeout, proxy: options.proxy });
    this.retryHandlers = options.retryHandlers ?? defaultRetryHandlers();
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetrics();
    this.defaultHeaders = {
      ...options.defaultHeaders,
      'User-Agent': buildUserAgent(options.userAgentPrefix, options.userAgentSuffix),
    };
  }

  /**
   * Send a message; fields left undefined are not sent
   */
  async send(message: WebhookMessage, headers?: Record<string, string>): Promise<WebhookResponse> {
    const body: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(message)) {
      if (value !== undefined) {
        body[key] = value;
      }
    }
    return this.sendDict(body, headers);
  }

  /**
   * Send an arbitrary JSON body
   */
  async sendDict(body: Record<string, unknown>, headers?: Record<string, string>): Promise<WebhookResponse> {
    const response = await sendWithRetries({
      transport: this.transport,
      request: {
        url: this.url,
        method: 'POST',
        headers: {
          ...this.defaultHeaders,
          'Content-Type': 'application/json;charset=utf-8',
          ...headers,
        },
        body: JSON.stringify(body),
        timeout: this.timeout,
      },
      retryHandlers: this.retryHandlers,
      logger: this.logger,
      metrics: this.metrics,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new SlackHttpError(response.status, response.body, this.url);
    }

    return {
      url: this.url,
      status: response.status,
      body: response.body,
      headers: response.headers,
    };
  }
}

/**
 * Slash command payload
 */
export interface SlashCommandPayload {
  token?: string;
  team_id: string;
  team_domain?: string;
  enterprise_id?: string;
  channel_id: string;
  channel_name?: string;
  user_id: string;
  user_name?: string;
  command: string;
  text: string;
  api_app_id?: string;
  response_url: string;
  trigger_id: string;
}

const interactivePayloadSchema = z
  .object({
    type: z.string(),
    team: z.object({ id: z.string(), domain: z.string().optional() }).passthrough().nullable().optional(),
    user: z.object({ id: z.string() }).passthrough().optional(),
    api_app_id: z.string().optional(),
    trigger_id: z.string().optional(),
    response_url: z.string().optional(),
    actions: z.array(z.object({ action_id: z.string() }).passthrough()).optional(),
  })
  .passthrough();

/**
 * Interactive payload (button clicks, select menus, shortcuts, view submissions)
 */
export type InteractivePayload = z.infer<typeof interactivePayloadSchema>;

/**
 * WebhookHandler options
 */
export interface WebhookHandlerOptions {
  clock?: Clock;
  dispatcher?: EventDispatcher;
  /** Used by `respond` */
  webhookOptions?: WebhookClientOptions;
}

/**
 * Verifies and parses requests Slack sends to the app
 */
export class WebhookHandler {
  readonly dispatcher: EventDispatcher;
  private readonly verifier?: SignatureVerifier;
  private readonly webhookOptions: WebhookClientOptions;

  constructor(signingSecret?: string, options: WebhookHandlerOptions = {}) {
    if (signingSecret) {
      this.verifier = new SignatureVerifier(signingSecret, options.clock);
    }
    this.dispatcher = options.dispatcher ?? new EventDispatcher();
    this.webhookOptions = options.webhookOptions ?? {};
  }

  /**
   * Verify and parse a slash command
   *
   * @throws {WebhookError}
   */
  parseSlashCommand(body: string, headers: Record<string, string | undefined> = {}): SlashCommandPayload {
    this.verify(body, headers);

    const params = new URLSearchParams(body);
    const command = params.get('command');
    if (!command) {
      throw WebhookError.invalidPayload('Missing command');
    }
    return {
      token: params.get('token') ?? undefined,
      team_id: params.get('team_id') ?? '',
      team_domain: params.get('team_domain') ?? undefined,
      enterprise_id: params.get('enterprise_id') ?? undefined,
      channel_id: params.get('channel_id') ?? '',
      channel_name: params.get('channel_name') ?? undefined,
      user_id: params.get('user_id') ?? '',
      user_name: params.get('user_name') ?? undefined,
      command,
      text: params.get('text') ?? '',
      api_app_id: params.get('api_app_id') ?? undefined,
      response_url: params.get('response_url') ?? '',
      trigger_id: params.get('trigger_id') ?? '',
    };
  }

  /**
   * Verify and parse an interactive payload
   *
   * @throws {WebhookError}
   */
  parseInteractive(body: string, headers: Record<string, string | undefined> = {}): InteractivePayload {
    this.verify(body, headers);

    const payload = new URLSearchParams(body).get('payload');
    if (!payload) {
      throw WebhookError.invalidPayload('Missing payload field');
    }
    const result = interactivePayloadSchema.safeParse(parseJson(payload));
    if (!result.success) {
      throw WebhookError.invalidPayload('Invalid interactive payload');
    }
    return result.data;
  }

  /**
   * Verify an Events API request and dispatch it.
   * URL verification requests return the challenge to echo back.
   *
   * @throws {WebhookError}
   */
  async handleEvents(
    body: string,
    headers: Record<string, string | undefined> = {}
  ): Promise<{ challenge: string } | undefined> {
    this.verify(body, headers);
    return this.dispatcher.handleRequest(parseJson(body));
  }

  /**
   * Reply through a response_url
   */
  async respond(responseUrl: string, message: WebhookMessage): Promise<WebhookResponse> {
    return new WebhookClient(responseUrl, this.webhookOptions).send(message);
  }

  private verify(body: string, headers: Record<string, string | undefined>): void {
    this.verifier?.verifyRequest(body, headers);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw WebhookError.invalidPayload(`Malformed JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Create webhook client
 */
export function createWebhookClient(url: string, options?: WebhookClientOptions): WebhookClient {
  return new WebhookClient(url, options);
}

/**
 * Create webhook handler
 */
export function createWebhookHandler(signingSecret?: string, options?: WebhookHandlerOptions): WebhookHandler {
  return new WebhookHandler(signingSecret, options);
}
