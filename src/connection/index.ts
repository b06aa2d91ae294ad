/**
 * WebSocket connection management shared by Socket Mode and RTM.
 */

export * from './websocket';
export * from './connection';
export * from './realtime-client';
