/**
 * Chat service for Slack API.
 */

import { SlackClient } from '../client';
import { Attachment, Block, ChannelId, Message, MessageMetadata, SlackResponse, Timestamp, UserId } from '../types';

/**
 * Fields shared by every message-posting method
 */
export interface MessageContent {
  text?: string;
  blocks?: Block[];
  attachments?: Attachment[];
  thread_ts?: Timestamp;
  metadata?: MessageMetadata;
}

/**
 * Post message parameters
 */
export interface PostMessageParams extends MessageContent {
  channel: ChannelId;
  reply_broadcast?: boolean;
  unfurl_links?: boolean;
  unfurl_media?: boolean;
  mrkdwn?: boolean;
}

export interface PostMessageResponse extends SlackResponse {
  channel: ChannelId;
  ts: Timestamp;
  message: Message;
}

export interface UpdateMessageParams extends Omit<MessageContent, 'thread_ts'> {
  channel: ChannelId;
  ts: Timestamp;
}

export interface UpdateMessageResponse extends SlackResponse {
  channel: ChannelId;
  ts: Timestamp;
  text: string;
}

export interface DeleteMessageResponse extends SlackResponse {
  channel: ChannelId;
  ts: Timestamp;
}

export interface PostEphemeralParams extends MessageContent {
  channel: ChannelId;
  user: UserId;
}

export interface PostEphemeralResponse extends SlackResponse {
  message_ts: Timestamp;
}

export interface GetPermalinkResponse extends SlackResponse {
  channel: ChannelId;
  permalink: string;
}

/**
 * Schedule message parameters; `post_at` is a Unix time in seconds
 */
export interface ScheduleMessageParams extends MessageContent {
  channel: ChannelId;
  post_at: number;
}

export interface ScheduleMessageResponse extends SlackResponse {
  channel: ChannelId;
  scheduled_message_id: string;
  post_at: number;
}

/**
 * Chat service
 */
export class ChatService {
  constructor(private client: SlackClient) {}

  /**
   * Post a message
   */
  async postMessage(params: PostMessageParams): Promise<PostMessageResponse> {
    return this.client.post<PostMessageResponse>('chat.postMessage', params);
  }

  /**
   * Update a message
   */
  async update(params: UpdateMessageParams): Promise<UpdateMessageResponse> {
    return this.client.post<UpdateMessageResponse>('chat.update', params);
  }

  async delete(channel: ChannelId, ts: Timestamp): Promise<DeleteMessageResponse> {
    return this.client.post<DeleteMessageResponse>('chat.delete', { channel, ts });
  }

  /**
   * Post a message only the given user sees
   */
  async postEphemeral(params: PostEphemeralParams): Promise<Timestamp> {
    const response = await this.client.post<PostEphemeralResponse>('chat.postEphemeral', params);
    return response.message_ts;
  }

  async getPermalink(channel: ChannelId, messageTs: Timestamp): Promise<string> {
    const response = await this.client.get<GetPermalinkResponse>('chat.getPermalink', {
      channel,
      message_ts: messageTs,
    });
    return response.permalink;
  }

  async scheduleMessage(params: ScheduleMessageParams): Promise<ScheduleMessageResponse> {
    return this.client.post<ScheduleMessageResponse>('chat.scheduleMessage', params);
  }
}
