export type { SessionStore, SessionWriteOptions, VersionedSession } from "./SessionStore";
export { InMemorySessionStore } from "./InMemorySessionStore";
