import type { SelectionSession } from "../types";

export type VersionedSession = Readonly<{
  session: SelectionSession;
  version: number;
}>;

export type SessionWriteOptions = Readonly<{
  expectedVersion?: number;
}>;

/**
 * SessionStore owns selection sessions.
 *
 * Rules:
 * - Sessions are replaced whole; stored values are never mutated in place
 * - Store may support optimistic concurrency via expectedVersion
 * - withLock serializes work on one session id; different ids run freely
 * - No expiry: TTL policy belongs to the deployment
 */
export interface SessionStore {
  get(sessionId: string): Promise<VersionedSession | null>;

  put(session: SelectionSession, opts?: SessionWriteOptions): Promise<VersionedSession>;

  withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T>;
}
