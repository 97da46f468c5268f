/**
 * Conversation Session
 *
 * Append-only turn history for one chat. Owns the reference → upload-turn
 * mapping and re-runs compaction after every user turn.
 *
 * Not locked internally: callers mutate a session through
 * SessionRegistry.withSession, which serializes turns per session.
 */

import { fail, ok, type Result } from '../errors.js';
import { appendMarkers, compactTurns, DEFAULT_RETENTION_TURNS, liveReferences, renderTurns } from './compactor.js';
import { contentReference } from './reference.js';
import type {
  AgentMessage,
  AppendedTurn,
  ConversationTurn,
  InboundImage,
  TurnImage,
} from './types.js';

export interface LiveImage {
  bytes: Uint8Array;
  mimeType: string;
  turnIndex: number;
}

export class ConversationSession {
  private turns: ConversationTurn[] = [];
  private readonly origins = new Map<string, number>();

  constructor(
    readonly id: string,
    private readonly retention: number = DEFAULT_RETENTION_TURNS
  ) {}

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  /**
   * Record a user turn. Images already uploaded earlier in the session keep
   * their original turn: while that payload is live this turn only carries
   * the marker, once it is pruned this turn holds the re-sent bytes.
   */
  appendUserTurn(text: string, images: readonly InboundImage[] = []): Result<AppendedTurn> {
    if (text.trim().length === 0 && images.length === 0) {
      return fail('InvalidArgument', 'A turn needs text or at least one image');
    }

    const references: string[] = [];
    const repeated: string[] = [];
    const reattached: string[] = [];
    const added: TurnImage[] = [];
    const held: TurnImage[] = [];

    for (const image of images) {
      const reference = contentReference(image.bytes);
      if (references.includes(reference)) continue;
      references.push(reference);

      const turnImage: TurnImage = {
        reference,
        mimeType: image.mimeType,
        byteLength: image.bytes.byteLength,
        payload: image.bytes,
      };
      if (!this.origins.has(reference)) {
        added.push(turnImage);
        held.push(turnImage);
      } else if (this.liveImage(reference)) {
        repeated.push(reference);
      } else {
        reattached.push(reference);
        held.push(turnImage);
      }
    }

    const index = this.turns.length;
    const liveBefore = new Set(this.turns.flatMap(liveReferences));

    this.turns = compactTurns(
      [
        ...this.turns,
        {
          index,
          role: 'user',
          text: appendMarkers(text, repeated),
          images: held,
          createdAt: new Date().toISOString(),
        },
      ],
      this.retention
    );
    for (const image of added) {
      this.origins.set(image.reference, index);
    }

    const liveAfter = new Set(this.turns.flatMap(liveReferences));
    const pruned = [...liveBefore].filter((reference) => !liveAfter.has(reference));
    if (pruned.length > 0) {
      console.log(`[Context] ${this.id}: pruned ${pruned.length} image(s) from history`);
    }

    return ok({
      turn: this.turns[index],
      references,
      added: added.map((image) => image.reference),
      repeated,
      reattached,
      pruned,
    });
  }

  appendAssistantTurn(text: string): ConversationTurn {
    const turn: ConversationTurn = {
      index: this.turns.length,
      role: 'assistant',
      text,
      images: [],
      createdAt: new Date().toISOString(),
    };
    this.turns = [...this.turns, turn];
    return turn;
  }

  /** Index of the turn the reference was uploaded in */
  originOf(reference: string): number | undefined {
    return this.origins.get(reference);
  }

  /**
   * Newest payload still held in history, from the original upload or a
   * later re-send; null once every copy is pruned or the image was never seen
   */
  liveImage(reference: string): LiveImage | null {
    for (let turnIndex = this.turns.length - 1; turnIndex >= 0; turnIndex--) {
      const image = this.turns[turnIndex].images.find((candidate) => candidate.reference === reference);
      if (image && image.payload !== null) {
        return { bytes: image.payload, mimeType: image.mimeType, turnIndex };
      }
    }
    return null;
  }

  render(): AgentMessage[] {
    return renderTurns(this.turns);
  }
}
