/**
 * Identifiers and response envelope shared across the Web API.
 */

/** Message timestamp, also the message's id within a channel */
export type Timestamp = string;

export type ChannelId = string;

export type UserId = string;

export type TeamId = string;

/**
 * Parse a message timestamp ("1700000000.000100") to a Date
 */
export function parseTimestamp(ts: Timestamp): Date {
  return new Date(parseFloat(ts) * 1000);
}

/**
 * Response metadata
 */
export interface ResponseMetadata {
  /** Next cursor for pagination; empty on the last page */
  next_cursor?: string;
  /** Deprecation and usage warnings */
  warnings?: string[];
  /** Detailed error messages */
  messages?: string[];
}

/**
 * Envelope of every Web API response
 */
export interface SlackResponse {
  ok: boolean;
  error?: string;
  warning?: string;
  response_metadata?: ResponseMetadata;
  [key: string]: unknown;
}

/**
 * Whether another page follows
 */
export function hasMore(metadata?: ResponseMetadata): boolean {
  return !!metadata?.next_cursor;
}
