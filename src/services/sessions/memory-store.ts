// In-memory session store
// Process-local history; optional idle expiry through TTLCache

import { TTLCache } from '../../utils/ttl-cache.js';
import type { Session, SessionStore, Turn } from './types.js';

interface HistoryMap {
  get(key: string): readonly Turn[] | undefined;
  set(key: string, value: readonly Turn[]): void;
  delete(key: string): boolean;
  keys(): IterableIterator<string>;
}

export interface MemorySessionStoreOptions {
  // Idle time after which a session is forgotten; 0 keeps sessions for the process lifetime
  ttlMs?: number;
}

export class MemorySessionStore implements SessionStore {
  private histories: HistoryMap;
  private cache: TTLCache<string, readonly Turn[]> | null = null;

  constructor(options: MemorySessionStoreOptions = {}) {
    const ttlMs = options.ttlMs ?? 0;
    if (ttlMs > 0) {
      this.cache = new TTLCache<string, readonly Turn[]>(ttlMs, Math.min(ttlMs, 60 * 1000));
      this.histories = this.cache;
    } else {
      this.histories = new Map<string, readonly Turn[]>();
    }
  }

  async load(sessionId: string): Promise<Session> {
    return this.snapshot(sessionId, this.histories.get(sessionId) ?? []);
  }

  async append(sessionId: string, ...turns: Turn[]): Promise<Session> {
    const next = Object.freeze([...(this.histories.get(sessionId) ?? []), ...turns]);
    this.histories.set(sessionId, next);
    return this.snapshot(sessionId, next);
  }

  async replace(sessionId: string, turns: readonly Turn[]): Promise<Session> {
    const next = Object.freeze([...turns]);
    this.histories.set(sessionId, next);
    return this.snapshot(sessionId, next);
  }

  async reset(sessionId: string): Promise<void> {
    this.histories.delete(sessionId);
  }

  async list(): Promise<string[]> {
    return Array.from(this.histories.keys());
  }

  destroy(): void {
    this.cache?.destroy();
  }

  private snapshot(sessionId: string, turns: readonly Turn[]): Session {
    return { id: sessionId, turns: [...turns] };
  }
}
