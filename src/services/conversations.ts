/**
 * Conversations service for Slack API.
 */

import { SlackClient } from '../client';
import { Channel, ChannelId, ConversationType, Message, SlackResponse, Timestamp, UserId } from '../types';

/**
 * List conversations parameters
 */
export interface ListConversationsParams {
  /** Comma-separated or array of conversation types */
  types?: ConversationType[] | string;
  exclude_archived?: boolean;
  limit?: number;
  cursor?: string;
  team_id?: string;
}

export interface ListConversationsResponse extends SlackResponse {
  channels: Channel[];
}

export interface ConversationInfoResponse extends SlackResponse {
  channel: Channel;
}

/**
 * History parameters
 */
export interface ConversationHistoryParams {
  channel: ChannelId;
  cursor?: string;
  latest?: Timestamp;
  oldest?: Timestamp;
  inclusive?: boolean;
  limit?: number;
}

export interface ConversationHistoryResponse extends SlackResponse {
  messages: Message[];
  has_more: boolean;
}

export interface ConversationRepliesParams extends ConversationHistoryParams {
  ts: Timestamp;
}

/**
 * Conversations service
 */
export class ConversationsService {
  constructor(private client: SlackClient) {}

  async list(params: ListConversationsParams = {}): Promise<ListConversationsResponse> {
    return this.client.get<ListConversationsResponse>('conversations.list', normalizeTypes(params));
  }

  /**
   * List every conversation, following cursors
   */
  async listAll(
    params: Omit<ListConversationsParams, 'cursor'> = {},
    limit?: number
  ): Promise<Channel[]> {
    return this.client.getAllPages<Channel, ListConversationsResponse>(
      'conversations.list',
      normalizeTypes(params),
      (response) => response.channels,
      limit
    );
  }

  async info(channel: ChannelId): Promise<Channel> {
    const response = await this.client.get<ConversationInfoResponse>('conversations.info', { channel });
    return response.channel;
  }

  async history(params: ConversationHistoryParams): Promise<ConversationHistoryResponse> {
    return this.client.get<ConversationHistoryResponse>('conversations.history', params);
  }

  /**
   * Messages of a thread, parent first
   */
  async replies(params: ConversationRepliesParams): Promise<ConversationHistoryResponse> {
    return this.client.get<ConversationHistoryResponse>('conversations.replies', params);
  }

  /**
   * Open (or resume) a DM or group DM
   */
  async open(users: UserId[]): Promise<Channel> {
    const response = await this.client.post<ConversationInfoResponse>('conversations.open', {
      users: users.join(','),
    });
    return response.channel;
  }

  async join(channel: ChannelId): Promise<Channel> {
    const response = await this.client.post<ConversationInfoResponse>('conversations.join', { channel });
    return response.channel;
  }
}

function normalizeTypes<T extends { types?: ConversationType[] | string }>(params: T): T {
  return Array.isArray(params.types) ? { ...params, types: params.types.join(',') } : params;
}
