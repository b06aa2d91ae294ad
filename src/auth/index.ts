/**
 * Request signature verification for inbound Slack requests.
 */

import * as crypto from 'crypto';
import { WebhookError } from '../errors';

/** Requests older than this (seconds) are rejected */
export const MAX_TIMESTAMP_AGE = 60 * 5;

/**
 * Time source, in Unix seconds
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};

/**
 * Mask token for logging
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 5)}...${token.substring(token.length - 4)}`;
}

/**
 * Signature verifier class
 */
export class SignatureVerifier {
  constructor(
    private readonly signingSecret: string,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Compute the `v0=` signature of a request body
   */
  generateSignature(timestamp: string, body: string): string {
    const hmac = crypto.createHmac('sha256', this.signingSecret).update(`v0:${timestamp}:${body}`);
    return `v0=${hmac.digest('hex')}`;
  }

  /**
   * Check a signature against the body and timestamp
   */
  isValid(body: string, timestamp: string | undefined, signature: string | undefined): boolean {
    return this.check(body, timestamp, signature) === undefined;
  }

  /**
   * Check a request, reading the Slack headers whatever their case
   */
  isValidRequest(body: string, headers: Record<string, string | undefined>): boolean {
    const { timestamp, signature } = signatureHeaders(headers);
    return this.isValid(body, timestamp, signature);
  }

  /**
   * Like `isValidRequest`, but tells why a request is rejected
   *
   * @throws {WebhookError}
   */
  verifyRequest(body: string, headers: Record<string, string | undefined>): void {
    const { timestamp, signature } = signatureHeaders(headers);
    const error = this.check(body, timestamp, signature);
    if (error) {
      throw error;
    }
  }

  private check(
    body: string,
    timestamp: string | undefined,
    signature: string | undefined
  ): WebhookError | undefined {
    if (!timestamp || !signature) {
      return WebhookError.invalidSignature();
    }
    const seconds = Number(timestamp);
    if (!Number.isFinite(seconds) || Math.abs(this.clock.now() - seconds) > MAX_TIMESTAMP_AGE) {
      return WebhookError.expiredTimestamp(timestamp);
    }

    const expected = Buffer.from(this.generateSignature(timestamp, body));
    const actual = Buffer.from(signature);
    if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
      return WebhookError.invalidSignature();
    }
    return undefined;
  }
}

function signatureHeaders(headers: Record<string, string | undefined>): {
  timestamp?: string;
  signature?: string;
} {
  let timestamp: string | undefined;
  let signature: string | undefined;
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (lower === 'x-slack-request-timestamp') timestamp = value;
    if (lower === 'x-slack-signature') signature = value;
  }
  return { timestamp, signature };
}
