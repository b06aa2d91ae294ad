/**
 * OAuth service for Slack API.
 */

import { SlackClient } from '../client';
import { SlackResponse, TeamId, UserId } from '../types';

/**
 * Token exchange parameters
 */
export interface OAuthV2AccessParams {
  client_id: string;
  client_secret: string;
  code: string;
  redirect_uri?: string;
}

/**
 * OAuth v2 access response
 */
export interface OAuthV2AccessResponse extends SlackResponse {
  access_token: string;
  token_type: string;
  scope: string;
  bot_user_id?: string;
  app_id: string;
  team: { id: TeamId; name: string };
  enterprise?: { id: string; name: string };
  authed_user: {
    id: UserId;
    scope?: string;
    access_token?: string;
    token_type?: string;
  };
}

/**
 * OAuth service
 */
export class OAuthService {
  constructor(private client: SlackClient) {}

  /**
   * Exchange a temporary authorization code for tokens
   */
  async v2Access(params: OAuthV2AccessParams): Promise<OAuthV2AccessResponse> {
    const { client_id, client_secret, ...rest } = params;
    const basic = Buffer.from(`${client_id}:${client_secret}`).toString('base64');
    return this.client.apiCall<OAuthV2AccessResponse>('oauth.v2.access', {
      params: rest,
      headers: { Authorization: `Basic ${basic}` },
    });
  }
}
