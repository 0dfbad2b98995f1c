/**
 * Conversation Context
 *
 * Per-session memory of the last id seen for each entity kind, plus a short
 * history of exchanges for the model prompt. Only the orchestrator writes to
 * it, and only on a clone that is committed once the turn is done.
 */

import { NoPriorReferenceError, UnrecognizedReferenceError } from '../types/errors.js';
import type { EntityKind } from '../tools/types.js';
import { anaphorPattern, classifyReference } from './references.js';

export interface Exchange {
  query: string;
  answer: string;
}

export interface ConversationSnapshot {
  sessionId: string;
  lastEntities: Record<EntityKind, number>;
  turnCount: number;
  history: Exchange[];
}

const DEFAULT_HISTORY_LIMIT = 6;

export class ConversationContext {
  private readonly entities: Map<EntityKind, number>;
  private exchanges: Exchange[];
  private turns: number;

  constructor(
    readonly sessionId: string,
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
    seed?: Omit<ConversationSnapshot, 'sessionId'>
  ) {
    this.entities = new Map(Object.entries(seed?.lastEntities ?? {}));
    this.exchanges = seed ? [...seed.history] : [];
    this.turns = seed?.turnCount ?? 0;
  }

  get turnCount(): number {
    return this.turns;
  }

  get history(): readonly Exchange[] {
    return this.exchanges;
  }

  lastEntity(kind: EntityKind): number | undefined {
    return this.entities.get(kind);
  }

  /**
   * Turn the text of an identifier argument into an id.
   *
   * @throws NoPriorReferenceError the text points back, but nothing of that kind was recorded
   * @throws UnrecognizedReferenceError the text is neither an id nor a reference
   */
  resolveReference(kind: EntityKind, surface: string): number {
    const form = classifyReference(kind, surface);

    switch (form.kind) {
      case 'literal':
        return form.id;
      case 'anaphor': {
        const id = this.lastEntity(kind);
        if (id === undefined) {
          throw new NoPriorReferenceError(kind, surface);
        }
        return id;
      }
      case 'unrecognized':
        throw new UnrecognizedReferenceError(kind, surface);
    }
  }

  /**
   * Most recent wins; there is no history stack per kind.
   */
  record(kind: EntityKind, id: number): void {
    this.entities.set(kind, id);
  }

  /**
   * Replace "that post" and friends with "post 2" for every recorded kind.
   */
  rewriteQuery(query: string): string {
    let rewritten = query;
    for (const [kind, id] of this.entities) {
      rewritten = rewritten.replace(anaphorPattern(kind), `${kind} ${id}`);
    }
    return rewritten;
  }

  recordExchange(query: string, answer: string): void {
    this.turns++;
    if (this.historyLimit === 0) {
      return;
    }
    this.exchanges = [...this.exchanges, { query, answer }].slice(-this.historyLimit);
  }

  clone(): ConversationContext {
    return new ConversationContext(this.sessionId, this.historyLimit, this.snapshot());
  }

  snapshot(): ConversationSnapshot {
    return {
      sessionId: this.sessionId,
      lastEntities: Object.fromEntries(this.entities),
      turnCount: this.turns,
      history: this.exchanges.map(exchange => ({ ...exchange }))
    };
  }
}
