/**
 * Session Store
 *
 * Holds one ConversationContext per session and serialises turns of the same
 * session, since turn N resolves references against what turn N-1 recorded.
 * Different sessions never wait on each other.
 */

import { ConversationContext } from './conversation-context.js';
import { logger } from '../utils/logger.js';

export interface SessionStoreOptions {
  /** Idle time after which a session is discarded */
  ttlMs: number;
  historyLimit: number;
  now?: () => number;
}

export interface SessionTurn<T> {
  /** Context to keep for the next turn */
  context: ConversationContext;
  value: T;
}

interface SessionEntry {
  context: ConversationContext;
  tail: Promise<void>;
  lastActive: number;
  pending: number;
  /** Bumped by `end()`; a turn started under an older one commits nothing */
  generation: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly historyLimit: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.historyLimit = options.historyLimit;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run `fn` once every earlier turn of the session has finished, then keep
   * the context it returns.
   */
  withSession<T>(sessionId: string, fn: (context: ConversationContext) => Promise<SessionTurn<T>>): Promise<T> {
    this.sweep();

    const entry = this.sessions.get(sessionId) ?? this.open(sessionId);
    entry.pending++;

    const run = entry.tail
      .then(async () => {
        const generation = entry.generation;
        const turn = await fn(entry.context);
        if (entry.generation === generation) {
          entry.context = turn.context;
        }
        return turn.value;
      })
      .finally(() => {
        entry.pending--;
        entry.lastActive = this.now();
      });

    // Failures reach the caller through `run`; the tail only orders turns.
    entry.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  get(sessionId: string): ConversationContext | undefined {
    return this.sessions.get(sessionId)?.context;
  }

  /**
   * Forget a session. With a turn still in flight the entry stays, so later
   * turns keep queueing behind it, but they start from an empty context.
   */
  end(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return false;
    }
    if (entry.pending > 0) {
      entry.context = new ConversationContext(sessionId, this.historyLimit);
      entry.generation++;
    } else {
      this.sessions.delete(sessionId);
    }
    logger.debug('Session ended', { sessionId, pending: entry.pending });
    return true;
  }

  /**
   * Drop idle sessions. Sessions with a turn in flight are kept.
   */
  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.pending === 0 && entry.lastActive < cutoff) {
        this.sessions.delete(sessionId);
        removed++;
        logger.debug('Session expired', { sessionId });
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private open(sessionId: string): SessionEntry {
    const entry: SessionEntry = {
      context: new ConversationContext(sessionId, this.historyLimit),
      tail: Promise.resolve(),
      lastActive: this.now(),
      pending: 0,
      generation: 0
    };
    this.sessions.set(sessionId, entry);
    logger.debug('Session opened', { sessionId });
    return entry;
  }
}
