/**
 * Chat Gateway Types
 *
 * A chat turn as the transport delivers it, and the reply it gets back.
 * Sessions are keyed by the transport's own chat id.
 */

import type { Failure } from '../errors.js';
import type { AgentMessage } from '../context/types.js';
import type { ToolError } from '../tools/schemas.js';

// ===========================================
// Core Types
// ===========================================

/**
 * Inbound turn from the transport
 */
export interface InboundTurn {
  /** Text content, may be empty when only images are sent */
  text?: string;
  /** Raw image bytes (decoded from the wire) */
  images?: InboundTurnImage[];
}

export interface InboundTurnImage {
  bytes: Uint8Array;
  mimeType: string;
}

/**
 * Reply sent back to the transport
 */
export interface ChatReply {
  /** Agent reply, null when the turn failed */
  text: string | null;
  /** Reserved for outbound files; always empty today */
  attachments: string[];
  error: ToolError | null;
}

/**
 * Calls the reasoning agent with the rendered history
 */
export type GenerateReply = (
  messages: AgentMessage[],
  context: { sessionId: string }
) => Promise<string | null>;

export interface ChatGatewayOptions {
  maxImageBytes: number;
  allowedMimeTypes: readonly string[];
}

// ===========================================
// Helpers
// ===========================================

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9:_.-]{0,127}$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

export function errorReply(error: Failure): ChatReply {
  return {
    text: null,
    attachments: [],
    error: { code: error.code, message: error.message, retryable: error.retryable },
  };
}
