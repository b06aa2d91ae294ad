/**
 * Socket Mode envelopes and acknowledgements.
 */

import { z } from 'zod';

/**
 * Envelope types that carry a request to acknowledge
 */
export type SocketModeRequestType = 'events_api' | 'interactive' | 'slash_commands' | (string & {});

/**
 * A request delivered over Socket Mode
 */
export interface SocketModeRequest {
  type: SocketModeRequestType;
  envelopeId: string;
  payload: Record<string, unknown>;
  acceptsResponsePayload: boolean;
  retryAttempt?: number;
  retryReason?: string;
}

/**
 * Acknowledgement sent back for an envelope
 */
export interface SocketModeResponse {
  envelope_id: string;
  payload?: unknown;
}

export const socketModeMessageSchema = z
  .object({
    type: z.string(),
    envelope_id: z.string().optional(),
    payload: z.record(z.unknown()).optional(),
    accepts_response_payload: z.boolean().optional(),
    retry_attempt: z.number().optional(),
    retry_reason: z.string().optional(),
    /** `disconnect` frames only */
    reason: z.string().optional(),
    num_connections: z.number().optional(),
  })
  .passthrough();

export type SocketModeMessage = z.infer<typeof socketModeMessageSchema>;

/**
 * Build a request from an envelope; undefined for frames that carry none
 */
export function toSocketModeRequest(message: SocketModeMessage): SocketModeRequest | undefined {
  if (message.envelope_id === undefined || message.payload === undefined) {
    return undefined;
  }
  return {
    type: message.type,
    envelopeId: message.envelope_id,
    payload: message.payload,
    acceptsResponsePayload: message.accepts_response_payload ?? false,
    retryAttempt: message.retry_attempt,
    retryReason: message.retry_reason,
  };
}

/**
 * Acknowledgement for a request; the payload is kept only when the envelope accepts one
 */
export function buildSocketModeResponse(request: SocketModeRequest, payload?: unknown): SocketModeResponse {
  const response: SocketModeResponse = { envelope_id: request.envelopeId };
  if (payload !== undefined && request.acceptsResponsePayload) {
    response.payload = payload;
  }
  return response;
}
