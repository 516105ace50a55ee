import type { AuditEvent } from "./AuditEvent";
import type { AuditSink } from "./AuditSink";

export class ConsoleAuditSink implements AuditSink {
  async emit(event: AuditEvent): Promise<void> {
    console.log(
      `[audit] ${event.eventType} session=${event.sessionId} step=${event.step} entity=${event.entityId}`,
    );
  }
}
