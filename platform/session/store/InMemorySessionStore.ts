import type { SelectionSession } from "../types";
import type { SessionStore, SessionWriteOptions, VersionedSession } from "./SessionStore";

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, VersionedSession>();
  private readonly locks = new Map<string, Promise<void>>();

  async get(sessionId: string): Promise<VersionedSession | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async put(session: SelectionSession, opts?: SessionWriteOptions): Promise<VersionedSession> {
    const existing = this.sessions.get(session.sessionId);
    const current = existing?.version ?? 0;

    if (opts?.expectedVersion != null && current !== opts.expectedVersion) {
      // store-level conflict signal; the session service translates it
      throw new Error(
        `SESSIONSTORE_CONFLICT: session ${session.sessionId} version ${current} != expected ${opts.expectedVersion}`,
      );
    }

    const record = { session, version: current + 1 };
    this.sessions.set(session.sessionId, record);
    return record;
  }

  async withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const result = previous.then(fn);
    // The tail only orders the next caller; failures reach this caller via `result`.
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(sessionId, tail);

    try {
      return await result;
    } finally {
      if (this.locks.get(sessionId) === tail) this.locks.delete(sessionId);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
