/**
 * Slack Socket Mode client for real-time events.
 */

import { SlackClient } from '../client';
import { RealtimeClient, RealtimeClientOptions, toError } from '../connection';
import { EventDispatcher, EventHandler, parseEventsApiBody } from '../events';
import { AppsService } from '../services';
import {
  SocketModeRequest,
  SocketModeResponse,
  buildSocketModeResponse,
  socketModeMessageSchema,
  toSocketModeRequest,
} from './request';

export * from './request';

/**
 * Called for every request before built-in dispatch
 */
export type SocketModeRequestListener = (
  client: SocketModeClient,
  request: SocketModeRequest
) => void | Promise<void>;

/**
 * Handler for interactive and slash command payloads; the return value
 * becomes the acknowledgement payload when the envelope accepts one
 */
export type SocketModePayloadHandler = (
  payload: Record<string, unknown>,
  request: SocketModeRequest
) => unknown | Promise<unknown>;

/**
 * Socket Mode client options
 */
export interface SocketModeClientOptions extends RealtimeClientOptions {
  /** App-level token (xapp-*) */
  appToken: string;
  /** Used to call apps.connections.open */
  webClient: SlackClient;
  /** Acknowledge every request once handled (default true) */
  autoAcknowledge?: boolean;
  dispatcher?: EventDispatcher;
}

/**
 * Socket Mode client
 */
export class SocketModeClient extends RealtimeClient {
  readonly socketModeRequestListeners: SocketModeRequestListener[] = [];
  readonly dispatcher: EventDispatcher;
  protected readonly clientName = 'socket-mode';

  private readonly appToken: string;
  private readonly apps: AppsService;
  private readonly autoAcknowledge: boolean;
  private interactiveHandler?: SocketModePayloadHandler;
  private slashCommandHandler?: SocketModePayloadHandler;

  constructor(options: SocketModeClientOptions) {
    super({ logger: options.webClient.logger, metrics: options.webClient.metrics, ...options });
    this.appToken = options.appToken;
    this.apps = new AppsService(options.webClient);
    this.autoAcknowledge = options.autoAcknowledge ?? true;
    this.dispatcher = options.dispatcher ?? new EventDispatcher();
  }

  /**
   * Register an Events API handler (`'*'` for every event)
   */
  on(eventType: string, handler: EventHandler): this {
    this.dispatcher.on(eventType, handler);
    return this;
  }

  onInteractive(handler: SocketModePayloadHandler): this {
    this.interactiveHandler = handler;
    return this;
  }

  onSlashCommand(handler: SocketModePayloadHandler): this {
    this.slashCommandHandler = handler;
    return this;
  }

  /**
   * Acknowledge an envelope
   */
  sendSocketModeResponse(response: SocketModeResponse): void {
    this.send(response);
  }

  protected async issueNewUrl(): Promise<string> {
    const response = await this.apps.connectionsOpen(this.appToken);
    return response.url;
  }

  protected async handleMessage(message: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(message);
    } catch {
      this.logger.warn('Received a non-JSON Socket Mode frame', { message: message.substring(0, 100) });
      return;
    }
    const parsed = socketModeMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('Received an unknown Socket Mode frame', { issues: parsed.error.issues.length });
      return;
    }
    const frame = parsed.data;

    switch (frame.type) {
      case 'hello':
        this.logger.info('Socket Mode session established', { numConnections: frame.num_connections });
        return;
      case 'disconnect':
        if (frame.reason === 'link_disabled') {
          this.logger.warn('Socket Mode is disabled for this app, closing the client');
          this.close();
          return;
        }
        this.logger.info('Server asked to reconnect', { reason: frame.reason });
        await this.connectToNewEndpoint(true);
        return;
    }

    const request = toSocketModeRequest(frame);
    if (request) {
      await this.handleRequest(request);
    } else {
      this.logger.debug('Ignored a Socket Mode frame', { type: frame.type });
    }
  }

  private async handleRequest(request: SocketModeRequest): Promise<void> {
    for (const listener of this.socketModeRequestListeners) {
      try {
        await listener(this, request);
      } catch (error) {
        this.logger.error('Socket Mode request listener failed', { error: toError(error).message });
        this.emitError(toError(error));
      }
    }

    let responsePayload: unknown;
    try {
      responsePayload = await this.dispatchRequest(request);
    } catch (error) {
      this.logger.error('Failed to process a Socket Mode request', {
        type: request.type,
        envelopeId: request.envelopeId,
        error: toError(error).message,
      });
      this.emitError(toError(error));
    }

    if (this.autoAcknowledge && this.isConnected()) {
      this.sendSocketModeResponse(buildSocketModeResponse(request, responsePayload));
    }
  }

  private async dispatchRequest(request: SocketModeRequest): Promise<unknown> {
    switch (request.type) {
      case 'events_api': {
        const body = parseEventsApiBody(request.payload);
        if (body.type === 'event_callback') {
          await this.dispatcher.dispatch(body);
        }
        return undefined;
      }
      case 'interactive':
        return this.interactiveHandler?.(request.payload, request);
      case 'slash_commands':
        return this.slashCommandHandler?.(request.payload, request);
      default:
        this.logger.debug('No handler for Socket Mode request type', { type: request.type });
        return undefined;
    }
  }
}

/**
 * Create Socket Mode client
 */
export function createSocketModeClient(options: SocketModeClientOptions): SocketModeClient {
  return new SocketModeClient(options);
}
