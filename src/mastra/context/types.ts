/**
 * Conversation Context Types
 */

export type TurnRole = 'user' | 'assistant';

export interface TurnImage {
  /** Content hash of the image bytes */
  reference: string;
  mimeType: string;
  byteLength: number;
  /** Raw bytes while the turn is inside the retention window, then null for good */
  payload: Uint8Array | null;
}

export interface ConversationTurn {
  index: number;
  role: TurnRole;
  /** May carry [IMAGE-ID <ref>] markers */
  text: string;
  /** Images first uploaded in this turn */
  images: readonly TurnImage[];
  createdAt: string;
}

export interface InboundImage {
  bytes: Uint8Array;
  mimeType: string;
}

export interface AppendedTurn {
  turn: ConversationTurn;
  /** Every image reference in this turn, upload order, deduplicated */
  references: string[];
  /** References first seen in this turn */
  added: string[];
  /** Earlier uploads whose payload is still live; this turn carries only their marker */
  repeated: string[];
  /** Earlier uploads whose payload had been pruned; this turn holds the bytes again */
  reattached: string[];
  /** References whose payloads this append pushed out of the window */
  pruned: string[];
}

export type AgentMessagePart =
  | { type: 'text'; text: string }
  | { type: 'image'; image: Uint8Array; mediaType: string };

export type AgentMessage =
  | { role: 'user'; content: string | AgentMessagePart[] }
  | { role: 'assistant'; content: string };
