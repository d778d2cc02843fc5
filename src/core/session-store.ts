import type { SessionId, SessionRecord } from "./types";

/**
 * In-memory home of active sessions. Records go in and come out as copies,
 * so nothing outside the engine holds a live reference.
 */
export class SessionStore {
  private readonly sessions = new Map<SessionId, SessionRecord>();

  saveSession(record: SessionRecord): void {
    this.sessions.set(record.id, structuredClone(record));
  }

  loadSession(sessionId: SessionId): SessionRecord | null {
    const record = this.sessions.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  deleteSession(sessionId: SessionId): boolean {
    return this.sessions.delete(sessionId);
  }

  has(sessionId: SessionId): boolean {
    return this.sessions.has(sessionId);
  }

  listSessions(): SessionRecord[] {
    return [...this.sessions.values()]
      .map((record) => structuredClone(record))
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }
}
