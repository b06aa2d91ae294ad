/**
 * Slack API Services.
 */

export * from './auth';
export * from './apps';
export * from './chat';
export * from './conversations';
export * from './oauth';
export * from './reactions';
export * from './rtm';
export * from './users';

import { SlackClient } from '../client';
import { AppsService } from './apps';
import { AuthService } from './auth';
import { ChatService } from './chat';
import { ConversationsService } from './conversations';
import { OAuthService } from './oauth';
import { ReactionsService } from './reactions';
import { RtmService } from './rtm';
import { UsersService } from './users';

/**
 * All services bundle
 */
export interface SlackServices {
  auth: AuthService;
  apps: AppsService;
  chat: ChatService;
  conversations: ConversationsService;
  oauth: OAuthService;
  reactions: ReactionsService;
  rtm: RtmService;
  users: UsersService;
}

/**
 * Create all services from client
 */
export function createServices(client: SlackClient): SlackServices {
  return {
    auth: new AuthService(client),
    apps: new AppsService(client),
    chat: new ChatService(client),
    conversations: new ConversationsService(client),
    oauth: new OAuthService(client),
    reactions: new ReactionsService(client),
    rtm: new RtmService(client),
    users: new UsersService(client),
  };
}
