/**
 * Real Time Messaging (RTM) client.
 */

import { SlackClient } from '../client';
import { RealtimeClient, RealtimeClientOptions, toError } from '../connection';
import { RateLimitError } from '../errors';
import { SlackEvent } from '../events';
import { AuthService, RtmService } from '../services';

/**
 * RTM event listener
 */
export type RTMListener = (client: RTMClient, event: SlackEvent) => void | Promise<void>;

/**
 * RTM client options
 */
export interface RTMClientOptions extends RealtimeClientOptions {
  webClient: SlackClient;
  /** Overrides the web client's configured token */
  token?: string;
}

function isSlackEvent(value: unknown): value is SlackEvent {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * RTM client
 */
export class RTMClient extends RealtimeClient {
  /** Bot id of the token's owner; its own events are not dispatched */
  botId?: string;
  protected readonly clientName = 'rtm';

  private readonly token?: string;
  private readonly auth: AuthService;
  private readonly rtm: RtmService;
  private readonly listeners: Map<string, RTMListener[]> = new Map();

  constructor(options: RTMClientOptions) {
    super({ logger: options.webClient.logger, metrics: options.webClient.metrics, ...options });
    this.token = options.token;
    this.auth = new AuthService(options.webClient);
    this.rtm = new RtmService(options.webClient);
  }

  /**
   * Register a listener for an event type, or `'*'` for all of them
   */
  on(eventType: string, listener: RTMListener): this {
    const listeners = this.listeners.get(eventType) ?? [];
    listeners.push(listener);
    this.listeners.set(eventType, listeners);
    return this;
  }

  off(eventType: string, listener?: RTMListener): this {
    if (!listener) {
      this.listeners.delete(eventType);
      return this;
    }
    const listeners = this.listeners.get(eventType);
    const index = listeners?.indexOf(listener) ?? -1;
    if (listeners && index !== -1) {
      listeners.splice(index, 1);
    }
    return this;
  }

  protected async issueNewUrl(): Promise<string> {
    if (this.botId === undefined) {
      const identity = await this.auth.test(this.token);
      this.botId = identity.bot_id ?? '';
    }

    for (;;) {
      try {
        const response = await this.rtm.connect(this.token);
        return response.url;
      } catch (error) {
        if (!(error instanceof RateLimitError) || this.isClosed()) {
          throw error;
        }
        this.logger.warn('rtm.connect is rate limited, waiting before retrying', { retryAfter: error.retryAfter });
        await this.sleep(error.retryAfter * 1000);
      }
    }
  }

  protected async handleMessage(message: string): Promise<void> {
    let event: unknown;
    try {
      event = JSON.parse(message);
    } catch {
      this.logger.warn('Received a non-JSON RTM frame', { message: message.substring(0, 100) });
      return;
    }
    if (!isSlackEvent(event)) {
      this.logger.debug('Ignored an RTM frame without a type');
      return;
    }

    if (event.type === 'goodbye') {
      this.logger.info('Server said goodbye, reconnecting');
      await this.connectToNewEndpoint(true);
      return;
    }

    if (this.botId && event.bot_id === this.botId) {
      this.logger.debug('Skipped an event from this bot', { type: event.type });
      return;
    }

    const listeners = [...(this.listeners.get(event.type) ?? []), ...(this.listeners.get('*') ?? [])];
    for (const listener of listeners) {
      try {
        await listener(this, event);
      } catch (error) {
        this.logger.error('RTM listener failed', { type: event.type, error: toError(error).message });
        this.emitError(toError(error));
      }
    }
  }
}

/**
 * Create RTM client
 */
export function createRTMClient(options: RTMClientOptions): RTMClient {
  return new RTMClient(options);
}
