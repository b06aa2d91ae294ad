/**
 * The slice of a `ws` WebSocket the real-time clients use.
 */

import WebSocket from 'ws';

/** `readyState` of an open socket */
export const OPEN = 1;

/**
 * Minimal WebSocket surface; `ws` sockets satisfy it, so do test fakes
 */
export interface WebSocketLike {
  readonly readyState: number;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'pong', listener: (data: Buffer) => void): unknown;
  send(data: string): void;
  ping(data?: string): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type WebSocketFactory = (url: string) => WebSocketLike;

export const defaultWebSocketFactory: WebSocketFactory = (url) => new WebSocket(url);

/**
 * Decode a received frame as UTF-8 text
 */
export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
