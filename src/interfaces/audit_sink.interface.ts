export type AuditEventKind = 'tool.started' | 'tool.succeeded' | 'tool.failed';

export interface IAuditSink {
  record(eventKind: AuditEventKind, details: Record<string, unknown>): void;
}
