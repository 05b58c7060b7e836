// src/store.ts
// In-memory session store: one Session per WhatsApp user id, serialized per user.

import PQueue from 'p-queue';
import { createSession, type Session } from './session.js';

type Entry = { session: Session; lastSeenAt: number };
type Lane = { queue: PQueue; inFlight: number };

export interface SessionStoreOptions {
  /** Idle time after which a session may be evicted. 0 keeps sessions forever. */
  ttlMs?: number;
  now?: () => number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Entry>();
  private readonly lanes = new Map<string, Lane>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: SessionStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 0;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Lookup-or-create. */
  get(userId: string): Session {
    const hit = this.sessions.get(userId);
    if (hit) {
      hit.lastSeenAt = this.now();
      return hit.session;
    }
    const session = createSession();
    this.sessions.set(userId, { session, lastSeenAt: this.now() });
    return session;
  }

  peek(userId: string): Session | undefined {
    return this.sessions.get(userId)?.session;
  }

  /**
   * Run `task` with the user's session. Tasks for the same user run one at a time
   * in arrival order; different users never wait on each other.
   */
  async withSession<T>(userId: string, task: (session: Session) => Promise<T>): Promise<T> {
    let lane = this.lanes.get(userId);
    if (!lane) {
      lane = { queue: new PQueue({ concurrency: 1 }), inFlight: 0 };
      this.lanes.set(userId, lane);
    }
    lane.inFlight += 1;
    try {
      return await lane.queue.add(() => task(this.get(userId)), { throwOnTimeout: true });
    } finally {
      lane.inFlight -= 1;
      if (lane.inFlight === 0) this.lanes.delete(userId);
    }
  }

  /** Evict idle sessions; users with queued or running work are kept. */
  sweep(now: number = this.now()): number {
    if (this.ttlMs <= 0) return 0;
    let evicted = 0;
    for (const [userId, entry] of this.sessions) {
      if (this.lanes.has(userId)) continue;
      if (now - entry.lastSeenAt > this.ttlMs) {
        this.sessions.delete(userId);
        evicted++;
      }
    }
    return evicted;
  }
}
