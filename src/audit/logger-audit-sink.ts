import { AuditEventKind, IAuditSink } from '../interfaces/audit_sink.interface.js';
import { ILogger } from '../interfaces/logger.interface.js';

/** Writes audit events to the application log; failures at warn level. */
export class LoggerAuditSink implements IAuditSink {
  constructor(private readonly logger: ILogger) {}

  record(eventKind: AuditEventKind, details: Record<string, unknown>): void {
    if (eventKind === 'tool.failed') {
      this.logger.warn(eventKind, details);
    } else {
      this.logger.info(eventKind, details);
    }
  }
}

/** Keeps events in memory, in emission order. */
export class MemoryAuditSink implements IAuditSink {
  readonly events: Array<{ kind: AuditEventKind; details: Record<string, unknown> }> = [];

  record(eventKind: AuditEventKind, details: Record<string, unknown>): void {
    this.events.push({ kind: eventKind, details });
  }
}
