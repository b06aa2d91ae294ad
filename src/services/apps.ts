/**
 * Apps service for Slack API.
 */

import { SlackClient } from '../client';
import { SlackResponse } from '../types';

/**
 * Connections open response
 */
export interface ConnectionsOpenResponse extends SlackResponse {
  /** Single-use WebSocket URL */
  url: string;
}

/**
 * Apps service
 */
export class AppsService {
  constructor(private client: SlackClient) {}

  /**
   * Issue a Socket Mode WebSocket URL. Requires an app-level token (xapp-*).
   */
  async connectionsOpen(appToken: string): Promise<ConnectionsOpenResponse> {
    return this.client.apiCall<ConnectionsOpenResponse>('apps.connections.open', { token: appToken });
  }
}
