/**
 * Unit tests for ConversationSession
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConversationSession } from '../../../src/mastra/context/session.js';
import { contentReference } from '../../../src/mastra/context/reference.js';
import { fakeImage } from '../../helpers/fakes.js';

describe('ConversationSession', () => {
  let session: ConversationSession;

  beforeEach(() => {
    session = new ConversationSession('chat-1', 3);
  });

  describe('appendUserTurn', () => {
    it('should assign each image its content reference', () => {
      const image = fakeImage('one');

      const result = session.appendUserTurn('here you go', [image]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const ref = contentReference(image.bytes);
      expect(result.value.references).toEqual([ref]);
      expect(result.value.added).toEqual([ref]);
      expect(result.value.turn.images[0]).toMatchObject({ reference: ref, mimeType: 'image/jpeg' });
      expect(session.originOf(ref)).toBe(0);
    });

    it('should prune the first image turn when a fourth arrives', () => {
      const images = ['one', 'two', 'three', 'four'].map((seed) => fakeImage(seed));
      const first = contentReference(images[0].bytes);

      session.appendUserTurn('receipt 1', [images[0]]);
      session.appendUserTurn('receipt 2', [images[1]]);
      session.appendUserTurn('receipt 3', [images[2]]);
      const fourth = session.appendUserTurn('receipt 4', [images[3]]);

      expect(fourth.ok && fourth.value.pruned).toEqual([first]);
      expect(session.history[0].images[0].payload).toBeNull();
      expect(session.history[0].text).toBe(`receipt 1\n[IMAGE-ID ${first}]`);
      expect(session.liveImage(first)).toBeNull();
      expect(session.liveImage(contentReference(images[1].bytes))).not.toBeNull();
    });

    it('should not prune on assistant turns', () => {
      session.appendUserTurn('', [fakeImage('one')]);
      session.appendAssistantTurn('Saved.');
      session.appendUserTurn('', [fakeImage('two')]);
      session.appendAssistantTurn('Saved.');
      session.appendUserTurn('', [fakeImage('three')]);
      session.appendAssistantTurn('Saved.');

      expect(session.history.filter((turn) => turn.images.some((i) => i.payload !== null))).toHaveLength(3);
    });

    it('should keep the original upload turn when an image is sent again', () => {
      const image = fakeImage('one');
      const ref = contentReference(image.bytes);
      session.appendUserTurn('first time', [image]);

      const again = session.appendUserTurn('did you save this?', [image]);

      expect(again.ok).toBe(true);
      if (!again.ok) return;
      expect(again.value.repeated).toEqual([ref]);
      expect(again.value.added).toEqual([]);
      expect(again.value.turn.images).toEqual([]);
      expect(again.value.turn.text).toBe(`did you save this?\n[IMAGE-ID ${ref}]`);
      expect(session.originOf(ref)).toBe(0);
    });

    it('should hold the bytes again when a pruned image is re-sent', () => {
      const images = ['one', 'two', 'three', 'four'].map((seed) => fakeImage(seed));
      const [first, second] = images.map((image) => contentReference(image.bytes));
      images.forEach((image, i) => session.appendUserTurn(`receipt ${i + 1}`, [image]));

      const again = session.appendUserTurn('is this saved?', [images[0]]);

      expect(again.ok).toBe(true);
      if (!again.ok) return;
      expect(again.value.reattached).toEqual([first]);
      expect(again.value.repeated).toEqual([]);
      expect(again.value.added).toEqual([]);
      expect(again.value.pruned).toEqual([second]);
      expect(again.value.turn.text).toBe('is this saved?');
      expect(again.value.turn.images).toEqual([
        { reference: first, mimeType: 'image/jpeg', byteLength: images[0].bytes.byteLength, payload: images[0].bytes },
      ]);
      expect(session.originOf(first)).toBe(0);
      expect(session.liveImage(first)).toEqual({ bytes: images[0].bytes, mimeType: 'image/jpeg', turnIndex: 4 });
      expect(session.render().at(-1)).toEqual({
        role: 'user',
        content: [
          { type: 'text', text: 'is this saved?' },
          { type: 'text', text: `[IMAGE-ID ${first}]` },
          { type: 'image', image: images[0].bytes, mediaType: 'image/jpeg' },
        ],
      });
    });

    it('should keep one copy of an image sent twice in the same turn', () => {
      const image = fakeImage('one');

      const result = session.appendUserTurn('', [image, image]);

      expect(result.ok && result.value.turn.images).toHaveLength(1);
    });

    it('should reject a turn with neither text nor images', () => {
      const result = session.appendUserTurn('   ', []);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('InvalidArgument');
      expect(session.history).toHaveLength(0);
    });
  });

  describe('render', () => {
    it('should render the compacted history in order', () => {
      const image = fakeImage('one');
      const ref = contentReference(image.bytes);
      session.appendUserTurn('lunch', [image]);
      session.appendAssistantTurn('Saved Cafe X.');

      const messages = session.render();

      expect(messages).toEqual([
        {
          role: 'user',
          content: [
            { type: 'text', text: 'lunch' },
            { type: 'text', text: `[IMAGE-ID ${ref}]` },
            { type: 'image', image: image.bytes, mediaType: 'image/jpeg' },
          ],
        },
        { role: 'assistant', content: 'Saved Cafe X.' },
      ]);
    });
  });
});
