export type { AuditEvent, AuditEventType } from "./AuditEvent";
export type { AuditSink } from "./AuditSink";
export { InMemoryAuditSink } from "./InMemoryAuditSink";
export { ConsoleAuditSink } from "./ConsoleAuditSink";
