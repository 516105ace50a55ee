import type { AuditEvent, AuditEventType } from "./AuditEvent";
import type { AuditSink } from "./AuditSink";

export class InMemoryAuditSink implements AuditSink {
  public readonly events: AuditEvent[] = [];

  async emit(event: AuditEvent): Promise<void> {
    this.events.push(event);
  }

  ofType(eventType: AuditEventType): AuditEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }
}
