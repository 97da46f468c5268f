/**
 * Session Registry
 *
 * Explicit `sessionId → ConversationSession` store. Sessions are created on
 * first use and only leave through `evict`.
 *
 * `withSession` serializes work per session: turns in one chat run one after
 * another, different chats never wait on each other.
 */

import { DEFAULT_RETENTION_TURNS } from './compactor.js';
import { ConversationSession } from './session.js';

export interface SessionRegistryOptions {
  retentionTurns?: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly retentionTurns: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.retentionTurns = options.retentionTurns ?? DEFAULT_RETENTION_TURNS;
  }

  getOrCreate(sessionId: string): ConversationSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new ConversationSession(sessionId, this.retentionTurns);
      this.sessions.set(sessionId, session);
      console.log(`[Context] New session ${sessionId}`);
    }
    return session;
  }

  get(sessionId: string): ConversationSession | undefined {
    return this.sessions.get(sessionId);
  }

  evict(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Run `task` once every earlier task for this session has settled.
   */
  async withSession<T>(sessionId: string, task: (session: ConversationSession) => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => task(this.getOrCreate(sessionId)));

    // The queue only tracks completion; the task's own error reaches the caller through `run`
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, settled);

    try {
      return await run;
    } finally {
      if (this.queues.get(sessionId) === settled) {
        this.queues.delete(sessionId);
      }
    }
  }
}
