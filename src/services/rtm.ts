/**
 * RTM service for Slack API.
 */

import { SlackClient } from '../client';
import { SlackResponse, TeamId, UserId } from '../types';

export interface RtmConnectResponse extends SlackResponse {
  /** Single-use WebSocket URL, valid for 30 seconds */
  url: string;
  team: { id: TeamId; name: string; domain: string };
  self: { id: UserId; name: string };
}

/**
 * RTM service
 */
export class RtmService {
  constructor(private client: SlackClient) {}

  async connect(token?: string): Promise<RtmConnectResponse> {
    return this.client.apiCall<RtmConnectResponse>('rtm.connect', { token });
  }
}
