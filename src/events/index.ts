/**
 * Slack Events API types and dispatch.
 */

import { z } from 'zod';
import { WebhookError } from '../errors';
import { ChannelId, Timestamp, UserId } from '../types';

/**
 * Any event; the payload fields depend on `type`
 */
export interface SlackEvent {
  type: string;
  event_ts?: string;
  [key: string]: unknown;
}

/**
 * Message event
 */
export interface MessageEvent extends SlackEvent {
  type: 'message';
  subtype?: string;
  channel: ChannelId;
  user?: UserId;
  text?: string;
  ts: Timestamp;
  thread_ts?: Timestamp;
  channel_type?: 'channel' | 'group' | 'im' | 'mpim';
  bot_id?: string;
}

/**
 * App mention event
 */
export interface AppMentionEvent extends SlackEvent {
  type: 'app_mention';
  user: UserId;
  text: string;
  ts: Timestamp;
  channel: ChannelId;
  thread_ts?: Timestamp;
}

/**
 * Reaction added / removed event
 */
export interface ReactionEvent extends SlackEvent {
  type: 'reaction_added' | 'reaction_removed';
  user: UserId;
  reaction: string;
  item: { type: string; channel?: ChannelId; ts?: Timestamp };
}

const slackEventSchema = z.object({ type: z.string(), event_ts: z.string().optional() }).passthrough();

const eventCallbackSchema = z
  .object({
    type: z.literal('event_callback'),
    team_id: z.string().optional(),
    api_app_id: z.string().optional(),
    event_id: z.string().optional(),
    event_time: z.number().optional(),
    event: slackEventSchema,
  })
  .passthrough();

const urlVerificationSchema = z.object({
  type: z.literal('url_verification'),
  token: z.string().optional(),
  challenge: z.string(),
});

const appRateLimitedSchema = z
  .object({
    type: z.literal('app_rate_limited'),
    team_id: z.string().optional(),
    minute_rate_limited: z.number(),
    api_app_id: z.string().optional(),
  })
  .passthrough();

const eventsApiBodySchema = z.discriminatedUnion('type', [
  eventCallbackSchema,
  urlVerificationSchema,
  appRateLimitedSchema,
]);

/**
 * Event callback wrapper
 */
export type EventCallback = z.infer<typeof eventCallbackSchema>;

export type UrlVerification = z.infer<typeof urlVerificationSchema>;

export type AppRateLimited = z.infer<typeof appRateLimitedSchema>;

/**
 * Body of an Events API request
 */
export type EventsApiBody = z.infer<typeof eventsApiBodySchema>;

/**
 * Validate an Events API request body
 *
 * @throws {WebhookError} when the body is not one of the known envelopes
 */
export function parseEventsApiBody(body: unknown): EventsApiBody {
  const result = eventsApiBodySchema.safeParse(body);
  if (!result.success) {
    throw WebhookError.invalidPayload(`Unrecognized Events API body: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

export function isMessageEvent(event: SlackEvent): event is MessageEvent {
  return event.type === 'message' && typeof event.channel === 'string' && typeof event.ts === 'string';
}

export function isAppMentionEvent(event: SlackEvent): event is AppMentionEvent {
  return event.type === 'app_mention' && typeof event.channel === 'string';
}

/**
 * Event handler type
 */
export type EventHandler = (event: SlackEvent, callback: EventCallback) => void | Promise<void>;

/**
 * Routes events to handlers registered by type, or `'*'` for all of them
 */
export class EventDispatcher {
  private handlers: Map<string, EventHandler[]> = new Map();

  /**
   * Register event handler
   */
  on(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType) ?? [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);
  }

  /**
   * Remove one handler, or every handler of a type
   */
  off(eventType: string, handler?: EventHandler): void {
    if (!handler) {
      this.handlers.delete(eventType);
      return;
    }

    const handlers = this.handlers.get(eventType);
    if (handlers) {
      const index = handlers.indexOf(handler);
      if (index !== -1) {
        handlers.splice(index, 1);
      }
    }
  }

  /**
   * Run the handlers for an event, type-specific ones first
   *
   * @returns the number of handlers run
   */
  async dispatch(callback: EventCallback): Promise<number> {
    const event = callback.event;
    const allHandlers = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get('*') ?? [])];

    for (const handler of allHandlers) {
      await handler(event, callback);
    }
    return allHandlers.length;
  }

  /**
   * Handle an Events API body. URL verification returns the challenge.
   */
  async handleRequest(body: unknown): Promise<{ challenge: string } | undefined> {
    const parsed = parseEventsApiBody(body);

    switch (parsed.type) {
      case 'url_verification':
        return { challenge: parsed.challenge };
      case 'app_rate_limited':
        // Surfaced as a regular event so `on('app_rate_limited')` sees it
        await this.dispatch({
          type: 'event_callback',
          api_app_id: parsed.api_app_id,
          team_id: parsed.team_id,
          event: {
            type: parsed.type,
            team_id: parsed.team_id,
            minute_rate_limited: parsed.minute_rate_limited,
          },
        });
        return undefined;
      case 'event_callback':
        await this.dispatch(parsed);
        return undefined;
    }
  }
}

/**
 * Create event dispatcher
 */
export function createEventDispatcher(): EventDispatcher {
  return new EventDispatcher();
}
