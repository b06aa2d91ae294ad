/**
 * Message-related types.
 */

import { ChannelId, Timestamp, UserId } from './common';

/**
 * Reaction on a message
 */
export interface Reaction {
  name: string;
  users: UserId[];
  count: number;
}

/**
 * Message attachment (legacy)
 */
export interface Attachment {
  fallback?: string;
  color?: string;
  pretext?: string;
  title?: string;
  title_link?: string;
  text?: string;
  fields?: { title: string; value: string; short?: boolean }[];
  footer?: string;
  ts?: number;
  [key: string]: unknown;
}

/**
 * Block Kit block, passed through untouched
 */
export interface Block {
  type: string;
  block_id?: string;
  [key: string]: unknown;
}

/**
 * Message metadata
 */
export interface MessageMetadata {
  event_type: string;
  event_payload: Record<string, unknown>;
}

/**
 * Slack message
 */
export interface Message {
  type: string;
  subtype?: string;
  text?: string;
  user?: UserId;
  bot_id?: string;
  ts: Timestamp;
  thread_ts?: Timestamp;
  reply_count?: number;
  reactions?: Reaction[];
  attachments?: Attachment[];
  blocks?: Block[];
  channel?: ChannelId;
  team?: string;
  metadata?: MessageMetadata;
}

/**
 * Whether the message is a reply inside a thread
 */
export function isThreadReply(message: Message): boolean {
  return message.thread_ts !== undefined && message.thread_ts !== message.ts;
}
