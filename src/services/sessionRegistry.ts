import { TutoringSession } from "../domain/tutoring";
import { SessionNotFoundError } from "../domain/errors";

/**
 * SessionRegistry holds the live sessions of one process, keyed by id.
 *
 * Sessions are never shared between processes. With `maxSessions` set, the
 * oldest registered session is dropped once the limit is passed; 0 means
 * no limit.
 */
export class SessionRegistry {
  private sessions = new Map<string, TutoringSession>();

  constructor(private maxSessions: number = 0) {}

  add(session: TutoringSession): void {
    this.sessions.set(session.id, session);

    if (this.maxSessions > 0) {
      // Map iteration order is insertion order, so the first key is the oldest
      for (const oldestId of this.sessions.keys()) {
        if (this.sessions.size <= this.maxSessions) break;
        this.sessions.delete(oldestId);
        console.log(`[registry] Evicted session ${oldestId} (limit ${this.maxSessions})`);
      }
    }
  }

  get(sessionId: string): TutoringSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  /**
   * Like get, but throws SessionNotFoundError for unknown ids
   */
  require(sessionId: string): TutoringSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
