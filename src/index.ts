/**
 * Slack SDK - TypeScript
 *
 * A TypeScript client for the Slack platform with support for:
 * - Web API (chat, conversations, users, reactions, auth, apps, rtm, oauth)
 * - Pluggable retry handlers (connection errors, rate limits, server errors)
 * - Socket Mode and RTM over WebSocket, with reconnects and a heartbeat
 * - Incoming Webhooks, response_url replies and signed inbound requests
 */

// Core exports
export * from './errors';
export * from './config';
export * from './types';
export * from './auth';
export * from './transport';
export * from './client';

// Services
export * from './services';

// Resilience
export * from './resilience';

// Inbound and real-time
export * from './events';
export * from './webhooks';
export * from './connection';
export * from './socket-mode';
export * from './rtm';

// Observability
export * from './observability';

// Testing utilities
export * from './mocks';

import { ClientOptions, SlackClient } from './client';
import { SlackConfig, SlackConfigBuilder, createConfigFromEnv, detectTokenType } from './config';
import { ConfigurationError } from './errors';
import { RTMClient } from './rtm';
import { SlackServices, createServices } from './services';
import { SocketModeClient, SocketModeClientOptions } from './socket-mode';

/**
 * Web client, its services and factories for the real-time clients
 */
export interface Slack {
  client: SlackClient;
  services: SlackServices;
  /** Socket Mode client using the configured app token and realtime settings */
  socketMode(options?: Partial<Omit<SocketModeClientOptions, 'webClient'>>): SocketModeClient;
  /** RTM client using the configured bot or user token */
  rtm(): RTMClient;
}

function configFromToken(token: string): SlackConfig {
  const builder = new SlackConfigBuilder();
  switch (detectTokenType(token)) {
    case 'bot':
      builder.botToken(token);
      break;
    case 'user':
      builder.userToken(token);
      break;
    case 'app':
      throw new ConfigurationError('An app token alone cannot call the Web API; pass a config with a bot or user token', [
        'token: app tokens (xapp-) need a bot or user token alongside',
      ]);
  }
  return builder.build();
}

/**
 * Create a web client with all services
 */
export function createSlack(
  tokenOrConfig: string | SlackConfig,
  options: Omit<ClientOptions, 'config'> = {}
): Slack {
  const config = typeof tokenOrConfig === 'string' ? configFromToken(tokenOrConfig) : tokenOrConfig;
  const client = new SlackClient({ ...options, config });

  return {
    client,
    services: createServices(client),
    socketMode: (socketOptions = {}) => {
      const appToken = socketOptions.appToken ?? config.appToken?.value;
      if (!appToken) {
        throw new ConfigurationError('App token is required for Socket Mode');
      }
      return new SocketModeClient({ ...config.realtime, ...socketOptions, appToken, webClient: client });
    },
    rtm: () => new RTMClient({ ...config.realtime, webClient: client }),
  };
}

/**
 * Create from environment variables
 */
export function createSlackFromEnv(options: Omit<ClientOptions, 'config'> = {}): Slack {
  return createSlack(createConfigFromEnv(process.env, options.logger), options);
}
