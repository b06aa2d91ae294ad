/**
 * Tests for error mapping.
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  AuthorizationError,
  InvalidArgumentsError,
  NetworkError,
  RateLimitError,
  RealtimeError,
  SlackApiError,
  SlackHttpError,
  fromSlackError,
  isRetryableError,
  isSlackApiError,
} from '../errors';

describe('fromSlackError', () => {
  it('should map rate limiting with Retry-After', () => {
    const error = fromSlackError('ratelimited', { ok: false, error: 'ratelimited' }, 429, 12);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error instanceof RateLimitError && error.retryAfter).toBe(12);
    expect(error.message).toBe('The request to the Slack API failed (error: ratelimited): retry after 12 seconds');
  });

  it('should treat any 429 as rate limiting', () => {
    expect(fromSlackError('whatever', { ok: false }, 429)).toBeInstanceOf(RateLimitError);
  });

  it.each([
    ['invalid_auth', AuthenticationError],
    ['token_revoked', AuthenticationError],
    ['missing_scope', AuthorizationError],
    ['invalid_arguments', InvalidArgumentsError],
  ])('should map %s', (code, type) => {
    expect(fromSlackError(code, { ok: false, error: code })).toBeInstanceOf(type);
  });

  it('should carry argument messages', () => {
    const error = fromSlackError('invalid_arguments', {
      ok: false,
      response_metadata: { messages: ['[ERROR] missing required field: channel'] },
    });

    expect(error instanceof InvalidArgumentsError && error.messages).toEqual([
      '[ERROR] missing required field: channel',
    ]);
    expect(error.message).toBe(
      'The request to the Slack API failed (error: invalid_arguments): [ERROR] missing required field: channel'
    );
  });

  it('should fall back to SlackApiError', () => {
    const error = fromSlackError('channel_not_found', { ok: false });

    expect(error.constructor).toBe(SlackApiError);
    expect(error.code).toBe('SLACK_API');
    expect(isSlackApiError(error)).toBe(true);
  });
});

describe('retryability', () => {
  it('should flag network and rate-limit errors as retryable', () => {
    expect(isRetryableError(NetworkError.timeout(100))).toBe(true);
    expect(isRetryableError(new RateLimitError({ ok: false }, 1))).toBe(true);
    expect(isRetryableError(fromSlackError('invalid_auth', { ok: false }))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should flag 5xx HTTP errors as retryable', () => {
    expect(new SlackHttpError(503, '').retryable).toBe(true);
    expect(new SlackHttpError(404, '').retryable).toBe(false);
  });

  it('should flag only connection failures among realtime errors', () => {
    expect(RealtimeError.connectionFailed('refused').retryable).toBe(true);
    expect(RealtimeError.reconnectFailed(3).message).toBe('Realtime error: Failed to reconnect after 3 attempts');
    expect(RealtimeError.notConnected().retryable).toBe(false);
  });
});

describe('SlackHttpError', () => {
  it('should truncate long bodies in the message', () => {
    const error = new SlackHttpError(500, 'x'.repeat(300));
    expect(error.message).toBe(`HTTP error: 500 ${'x'.repeat(200)}...`);
    expect(error.httpStatus).toBe(500);
  });
});
