/**
 * Tests for events handling.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  EventCallback,
  EventDispatcher,
  SlackEvent,
  createEventDispatcher,
  isAppMentionEvent,
  isMessageEvent,
  parseEventsApiBody,
} from '../events';
import { WebhookError } from '../errors';

function eventCallback(event: SlackEvent): EventCallback {
  return { type: 'event_callback', team_id: 'T123', api_app_id: 'A123', event_id: 'Ev1', event };
}

const message: SlackEvent = {
  type: 'message',
  channel: 'C123',
  user: 'U123',
  text: 'Hello',
  ts: '1700000000.000100',
};

describe('EventDispatcher', () => {
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    dispatcher = createEventDispatcher();
  });

  it('should run handlers for the event type', async () => {
    const handler = vi.fn();
    dispatcher.on('message', handler);

    const callback = eventCallback(message);
    const count = await dispatcher.dispatch(callback);

    expect(count).toBe(1);
    expect(handler).toHaveBeenCalledWith(message, callback);
  });

  it('should run type handlers before wildcard handlers', async () => {
    const order: string[] = [];
    dispatcher.on('*', () => {
      order.push('wildcard');
    });
    dispatcher.on('message', () => {
      order.push('message');
    });

    await dispatcher.dispatch(eventCallback(message));

    expect(order).toEqual(['message', 'wildcard']);
  });

  it('should not run handlers of other types', async () => {
    const handler = vi.fn();
    dispatcher.on('app_mention', handler);

    expect(await dispatcher.dispatch(eventCallback(message))).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should remove one handler or all of a type', async () => {
    const first = vi.fn();
    const second = vi.fn();
    dispatcher.on('message', first);
    dispatcher.on('message', second);

    dispatcher.off('message', first);
    await dispatcher.dispatch(eventCallback(message));
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);

    dispatcher.off('message');
    expect(await dispatcher.dispatch(eventCallback(message))).toBe(0);
  });

  it('should propagate handler failures', async () => {
    dispatcher.on('message', () => {
      throw new Error('handler failed');
    });

    await expect(dispatcher.dispatch(eventCallback(message))).rejects.toThrow('handler failed');
  });

  describe('handleRequest', () => {
    it('should answer URL verification with the challenge', async () => {
      const result = await dispatcher.handleRequest({ type: 'url_verification', token: 't', challenge: 'abc123' });

      expect(result).toEqual({ challenge: 'abc123' });
    });

    it('should dispatch event callbacks', async () => {
      const handler = vi.fn();
      dispatcher.on('message', handler);

      const result = await dispatcher.handleRequest(eventCallback(message));

      expect(result).toBeUndefined();
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should surface app_rate_limited as an event', async () => {
      const handler = vi.fn();
      dispatcher.on('app_rate_limited', handler);

      await dispatcher.handleRequest({
        type: 'app_rate_limited',
        team_id: 'T123',
        minute_rate_limited: 1700000000,
        api_app_id: 'A123',
      });

      expect(handler).toHaveBeenCalledWith(
        { type: 'app_rate_limited', team_id: 'T123', minute_rate_limited: 1700000000 },
        expect.objectContaining({ type: 'event_callback', api_app_id: 'A123' })
      );
    });

    it('should reject unknown envelopes', async () => {
      await expect(dispatcher.handleRequest({ type: 'block_actions' })).rejects.toBeInstanceOf(WebhookError);
    });
  });
});

describe('parseEventsApiBody', () => {
  it('should keep extra event fields', () => {
    const parsed = parseEventsApiBody(eventCallback(message));

    expect(parsed.type).toBe('event_callback');
    expect(parsed.type === 'event_callback' && parsed.event.text).toBe('Hello');
  });

  it('should require a challenge for URL verification', () => {
    expect(() => parseEventsApiBody({ type: 'url_verification' })).toThrow(WebhookError);
  });
});

describe('event guards', () => {
  it('should recognise message events', () => {
    expect(isMessageEvent(message)).toBe(true);
    expect(isMessageEvent({ type: 'message' })).toBe(false);
  });

  it('should recognise app mentions', () => {
    expect(isAppMentionEvent({ type: 'app_mention', channel: 'C1', user: 'U1', text: '<@U2> hi', ts: '1.0' })).toBe(
      true
    );
    expect(isAppMentionEvent(message)).toBe(false);
  });
});
