import { log } from "./logger";

export interface StoredSession {
  id: string;
  lastActivityAt: Date;
}

export interface SessionStore<T extends StoredSession> {
  get(id: string): Promise<T | undefined>;
  save(session: T): Promise<void>;
  size(): Promise<number>;
}

/**
 * Process-local store. Sessions idle for longer than `ttlMs` are evicted
 * on the next access; a ttl of 0 keeps them forever.
 */
export class InMemorySessionStore<T extends StoredSession> implements SessionStore<T> {
  private sessions = new Map<string, T>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  async get(id: string): Promise<T | undefined> {
    this.evictExpired();
    return this.sessions.get(id);
  }

  async save(session: T): Promise<void> {
    this.evictExpired();
    this.sessions.set(session.id, session);
  }

  async size(): Promise<number> {
    this.evictExpired();
    return this.sessions.size;
  }

  private evictExpired(): void {
    if (this.ttlMs <= 0) return;
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (session.lastActivityAt.getTime() < cutoff) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) log(`evicted ${evicted} idle session(s)`, "sessions");
  }
}
