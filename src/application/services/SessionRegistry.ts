import { SessionHistory } from './SessionHistory.js';

/**
 * Session id to history mapping, owned by the application entry point.
 *
 * Histories are created on first reference and live for the whole process: there is no
 * eviction, TTL or persistence. Callers must not drive two turns of the same session
 * concurrently; interleaved appends are not coordinated.
 */
export class SessionRegistry {
  private sessions: Map<string, SessionHistory> = new Map();

  /**
   * Returns the shared history for a session, creating it if needed
   */
  getOrCreate(sessionId: string): SessionHistory {
    let history = this.sessions.get(sessionId);
    if (!history) {
      history = new SessionHistory(sessionId);
      this.sessions.set(sessionId, history);
    }
    return history;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  getSessionIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  get size(): number {
    return this.sessions.size;
  }

  getTotalMessages(): number {
    let total = 0;
    for (const history of this.sessions.values()) {
      total += history.length;
    }
    return total;
  }
}
