import { randomUUID } from 'crypto';
import { log } from '../utils/logger';
import type { ChatTurn, ConversationState } from '../types';

export interface SessionStoreOptions {
  /** Sessions idle for longer than this are dropped. */
  ttlMs: number;
  /** Least recently used sessions are dropped beyond this count. */
  maxSessions: number;
  now?: () => number;
}

/** History as a turn found it, plus the generation that must still be current when the turn is saved. */
export interface SessionSnapshot {
  history: ConversationState;
  generation: number;
}

interface SessionEntry {
  history: ConversationState;
  generation: number;
  lastUsedAt: number;
}

/**
 * Per-session chat histories, held in process memory only. Map order is
 * least recently used first.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly now: () => number;
  private nextGeneration = 0;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  createId(): string {
    return randomUUID();
  }

  get(sessionId: string): ConversationState {
    return this.live(sessionId)?.history ?? [];
  }

  /** Opens the session (creating it if needed) at the start of a turn. */
  begin(sessionId: string): SessionSnapshot {
    const entry = this.live(sessionId) ?? { history: [], generation: ++this.nextGeneration, lastUsedAt: 0 };
    this.touch(sessionId, entry);
    return { history: entry.history, generation: entry.generation };
  }

  /**
   * Adds a finished turn's messages. Returns false and stores nothing when
   * the session was reset or expired after `begin`.
   */
  append(sessionId: string, turns: readonly ChatTurn[], generation: number): boolean {
    const entry = this.live(sessionId);
    if (!entry || entry.generation !== generation) {
      return false;
    }
    this.touch(sessionId, { ...entry, history: [...entry.history, ...turns] });
    return true;
  }

  reset(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    this.evictIdle();
    return this.sessions.size;
  }

  private isIdle(entry: SessionEntry): boolean {
    return this.now() - entry.lastUsedAt > this.options.ttlMs;
  }

  private live(sessionId: string): SessionEntry | undefined {
    const entry = this.sessions.get(sessionId);
    if (entry && this.isIdle(entry)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return entry;
  }

  private touch(sessionId: string, entry: SessionEntry): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, { ...entry, lastUsedAt: this.now() });
    this.evictIdle();

    let dropped = 0;
    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.options.maxSessions) break;
      this.sessions.delete(oldest);
      dropped++;
    }
    if (dropped > 0) {
      log('debug', 'Dropped least recently used sessions', { dropped, maxSessions: this.options.maxSessions });
    }
  }

  private evictIdle(): void {
    let evicted = 0;
    for (const [sessionId, entry] of this.sessions) {
      if (!this.isIdle(entry)) break;
      this.sessions.delete(sessionId);
      evicted++;
    }
    if (evicted > 0) {
      log('debug', 'Evicted idle sessions', { evicted, remaining: this.sessions.size });
    }
  }
}
