/**
 * Auth service for Slack API.
 */

import { SlackClient } from '../client';
import { SlackResponse, TeamId, UserId } from '../types';

/**
 * Identity behind a token
 */
export interface AuthTestResponse extends SlackResponse {
  url: string;
  team: string;
  user: string;
  team_id: TeamId;
  user_id: UserId;
  /** Present for bot tokens */
  bot_id?: string;
  is_enterprise_install?: boolean;
}

export interface AuthRevokeResponse extends SlackResponse {
  revoked: boolean;
}

/**
 * Auth service
 */
export class AuthService {
  constructor(private client: SlackClient) {}

  /**
   * Check a token and describe its owner
   */
  async test(token?: string): Promise<AuthTestResponse> {
    return this.client.apiCall<AuthTestResponse>('auth.test', { token });
  }

  /**
   * Revoke the token; `test` only checks whether it could be revoked
   */
  async revoke(test = false): Promise<boolean> {
    const response = await this.client.post<AuthRevokeResponse>('auth.revoke', { test: test || undefined });
    return response.revoked;
  }
}
