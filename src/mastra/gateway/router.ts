/**
 * Chat Gateway Router
 *
 * One turn at a time per session:
 * record the user turn → render compacted history → call the agent →
 * record the assistant turn.
 *
 * Turns of the same session queue behind each other through
 * SessionRegistry.withSession; other sessions run concurrently.
 */

import type { SessionRegistry } from '../context/registry.js';
import { errorMessage, failure, type Failure } from '../errors.js';
import {
  errorReply,
  isValidSessionId,
  type ChatGatewayOptions,
  type ChatReply,
  type GenerateReply,
  type InboundTurn,
} from './types.js';

export class ChatGateway {
  constructor(
    private readonly sessions: SessionRegistry,
    private readonly generateReply: GenerateReply,
    private readonly options: ChatGatewayOptions
  ) {}

  /**
   * Handle one inbound turn and return the agent's reply
   */
  async handleTurn(sessionId: string, turn: InboundTurn): Promise<ChatReply> {
    const invalid = this.validate(sessionId, turn);
    if (invalid) {
      console.warn(`[Gateway] Rejected turn for ${sessionId}: ${invalid.message}`);
      return errorReply(invalid);
    }

    const text = turn.text ?? '';
    const images = turn.images ?? [];

    console.log(`\n${'='.repeat(60)}`);
    console.log(`[Gateway] 📨 ${sessionId}`);
    console.log(`  Text:   ${text.substring(0, 50) || '(no text)'}`);
    console.log(`  Images: ${images.length}`);
    console.log(`${'='.repeat(60)}\n`);

    return this.sessions.withSession(sessionId, async (session) => {
      const appended = session.appendUserTurn(text, images);
      if (!appended.ok) {
        return errorReply(appended.error);
      }
      if (appended.value.repeated.length > 0) {
        console.log(`[Gateway] ${sessionId}: ${appended.value.repeated.length} image(s) already in this session`);
      }
      if (appended.value.reattached.length > 0) {
        console.log(`[Gateway] ${sessionId}: ${appended.value.reattached.length} pruned image(s) sent again`);
      }

      const messages = session.render();

      let reply: string | null;
      try {
        reply = await this.generateReply(messages, { sessionId });
      } catch (error) {
        console.error(`[Gateway] ❌ ${sessionId} agent failed:`, error);
        return errorReply(failure('AgentUnavailable', `The assistant could not answer: ${errorMessage(error)}`));
      }

      if (reply) {
        session.appendAssistantTurn(reply);
      }
      console.log(`[Gateway] ✅ ${sessionId} replied (${reply?.length ?? 0} chars)`);

      return { text: reply, attachments: [], error: null };
    });
  }

  private validate(sessionId: string, turn: InboundTurn): Failure | null {
    if (!isValidSessionId(sessionId)) {
      return failure('InvalidArgument', 'Session id must be 1-128 characters of letters, digits, ":", "_", "." or "-"');
    }

    for (const [index, image] of (turn.images ?? []).entries()) {
      if (!this.options.allowedMimeTypes.includes(image.mimeType)) {
        return failure(
          'InvalidArgument',
          `images.${index}: unsupported type ${image.mimeType} (allowed: ${this.options.allowedMimeTypes.join(', ')})`
        );
      }
      if (image.bytes.byteLength === 0) {
        return failure('InvalidArgument', `images.${index}: image is empty`);
      }
      if (image.bytes.byteLength > this.options.maxImageBytes) {
        return failure(
          'InvalidArgument',
          `images.${index}: image is ${image.bytes.byteLength} bytes, limit is ${this.options.maxImageBytes}`
        );
      }
    }

    return null;
  }
}
