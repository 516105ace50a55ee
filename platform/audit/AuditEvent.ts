export type AuditEventType =
  | "SESSION_STARTED"
  | "COMPONENT_SELECTED";

export type AuditEvent = Readonly<{
  eventId: string;
  sessionId: string;
  eventType: AuditEventType;
  /** Session id for SESSION_STARTED, component id for COMPONENT_SELECTED. */
  entityId: string;
  step: number;
  timestamp: string;
  metadata?: Record<string, unknown>;
}>;
