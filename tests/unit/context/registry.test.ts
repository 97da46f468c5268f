/**
 * Unit tests for SessionRegistry
 */

import { describe, it, expect } from 'vitest';
import { SessionRegistry } from '../../../src/mastra/context/registry.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionRegistry', () => {
  it('should create a session on first use and return it afterwards', () => {
    const registry = new SessionRegistry();

    const created = registry.getOrCreate('chat-1');

    expect(registry.get('chat-1')).toBe(created);
    expect(registry.getOrCreate('chat-1')).toBe(created);
    expect(registry.size).toBe(1);
  });

  it('should not create a session on get', () => {
    const registry = new SessionRegistry();

    expect(registry.get('chat-1')).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('should evict a session', () => {
    const registry = new SessionRegistry();
    registry.getOrCreate('chat-1');

    expect(registry.evict('chat-1')).toBe(true);
    expect(registry.get('chat-1')).toBeUndefined();
  });

  it('should run turns of one session one after another', async () => {
    const registry = new SessionRegistry();
    const gate = deferred();
    const events: string[] = [];

    const first = registry.withSession('chat-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = registry.withSession('chat-1', async () => {
      events.push('second:start');
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not make other sessions wait', async () => {
    const registry = new SessionRegistry();
    const gate = deferred();
    const events: string[] = [];

    const blocked = registry.withSession('chat-1', async () => {
      await gate.promise;
      events.push('chat-1');
    });
    await registry.withSession('chat-2', async () => {
      events.push('chat-2');
    });

    expect(events).toEqual(['chat-2']);
    gate.resolve();
    await blocked;
  });

  it('should keep the queue moving after a failed turn', async () => {
    const registry = new SessionRegistry();

    const failed = registry.withSession('chat-1', async () => {
      throw new Error('boom');
    });
    const next = registry.withSession('chat-1', async (session) => session.id);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('chat-1');
  });

  it('should apply the configured retention to new sessions', () => {
    const registry = new SessionRegistry({ retentionTurns: 1 });
    const session = registry.getOrCreate('chat-1');

    session.appendUserTurn('', [{ bytes: new Uint8Array([1]), mimeType: 'image/png' }]);
    session.appendUserTurn('', [{ bytes: new Uint8Array([2]), mimeType: 'image/png' }]);

    expect(session.history[0].images[0].payload).toBeNull();
    expect(session.history[1].images[0].payload).not.toBeNull();
  });
});
