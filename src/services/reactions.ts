/**
 * Reactions service for Slack API.
 */

import { SlackClient } from '../client';
import { ChannelId, Message, SlackResponse, Timestamp } from '../types';

/**
 * Target of a reaction; `name` is the emoji name without colons
 */
export interface ReactionParams {
  channel: ChannelId;
  timestamp: Timestamp;
  name: string;
}

export interface GetReactionsResponse extends SlackResponse {
  type: string;
  channel?: ChannelId;
  message?: Message;
}

/**
 * Reactions service
 */
export class ReactionsService {
  constructor(private client: SlackClient) {}

  async add(params: ReactionParams): Promise<void> {
    await this.client.post('reactions.add', params);
  }

  async remove(params: ReactionParams): Promise<void> {
    await this.client.post('reactions.remove', params);
  }

  /**
   * Reactions on a message
   */
  async get(channel: ChannelId, timestamp: Timestamp): Promise<GetReactionsResponse> {
    return this.client.get<GetReactionsResponse>('reactions.get', { channel, timestamp, full: true });
  }
}
