/**
 * Context Compactor
 *
 * Pure functions over a session's turn list. Multimodal payloads dominate
 * context cost, so only the most recent image-bearing turns keep their bytes;
 * older ones keep a marker the agent can hand back to the tools.
 *
 * Pruning only goes one way: a pruned turn has no payload left to restore,
 * and compaction never touches it again.
 */

import { imageMarker } from './reference.js';
import type { AgentMessage, AgentMessagePart, ConversationTurn } from './types.js';

export const DEFAULT_RETENTION_TURNS = 3;

export function hasLivePayload(turn: ConversationTurn): boolean {
  return turn.images.some((image) => image.payload !== null);
}

export function liveReferences(turn: ConversationTurn): string[] {
  return turn.images.filter((image) => image.payload !== null).map((image) => image.reference);
}

export function appendMarkers(text: string, references: readonly string[]): string {
  return [text, ...references.map(imageMarker)].filter((part) => part.length > 0).join('\n');
}

function pruneTurn(turn: ConversationTurn): ConversationTurn {
  return {
    ...turn,
    text: appendMarkers(turn.text, liveReferences(turn)),
    images: turn.images.map((image) => (image.payload === null ? image : { ...image, payload: null })),
  };
}

/**
 * Keep payloads for the `retention` newest turns that still have one;
 * null the rest and inline their markers. Returns a new list.
 */
export function compactTurns(
  turns: readonly ConversationTurn[],
  retention: number = DEFAULT_RETENTION_TURNS
): ConversationTurn[] {
  if (!Number.isInteger(retention) || retention < 0) {
    throw new RangeError(`retention must be a non-negative integer, got ${retention}`);
  }

  const compacted = [...turns];
  let kept = 0;
  for (let i = turns.length - 1; i >= 0; i--) {
    if (!hasLivePayload(turns[i])) continue;
    if (kept < retention) {
      kept++;
      continue;
    }
    compacted[i] = pruneTurn(turns[i]);
  }
  return compacted;
}

/**
 * Render turns as agent messages. Each live image is preceded by its marker
 * so the agent knows which reference to pass to the receipt tools.
 */
export function renderTurns(turns: readonly ConversationTurn[]): AgentMessage[] {
  return turns.map((turn): AgentMessage => {
    if (turn.role === 'assistant') {
      return { role: 'assistant', content: turn.text };
    }
    if (!hasLivePayload(turn)) {
      return { role: 'user', content: turn.text };
    }

    const parts: AgentMessagePart[] = turn.text.length > 0 ? [{ type: 'text', text: turn.text }] : [];
    for (const image of turn.images) {
      if (image.payload === null) continue;
      parts.push({ type: 'text', text: imageMarker(image.reference) });
      parts.push({ type: 'image', image: image.payload, mediaType: image.mimeType });
    }
    return { role: 'user', content: parts };
  });
}
