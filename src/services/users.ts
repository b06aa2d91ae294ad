/**
 * Users service for Slack API.
 */

import { SlackClient } from '../client';
import { SlackResponse, User, UserId } from '../types';

export interface ListUsersParams {
  limit?: number;
  cursor?: string;
  include_locale?: boolean;
  team_id?: string;
}

export interface ListUsersResponse extends SlackResponse {
  members: User[];
}

export interface UserResponse extends SlackResponse {
  user: User;
}

/**
 * Users service
 */
export class UsersService {
  constructor(private client: SlackClient) {}

  async info(user: UserId, includeLocale = false): Promise<User> {
    const response = await this.client.get<UserResponse>('users.info', {
      user,
      include_locale: includeLocale || undefined,
    });
    return response.user;
  }

  async list(params: ListUsersParams = {}): Promise<ListUsersResponse> {
    return this.client.get<ListUsersResponse>('users.list', params);
  }

  /**
   * List every member of the workspace, following cursors
   */
  async listAll(params: Omit<ListUsersParams, 'cursor'> = {}, limit?: number): Promise<User[]> {
    return this.client.getAllPages<User, ListUsersResponse>(
      'users.list',
      params,
      (response) => response.members,
      limit
    );
  }

  async lookupByEmail(email: string): Promise<User> {
    const response = await this.client.get<UserResponse>('users.lookupByEmail', { email });
    return response.user;
  }
}
