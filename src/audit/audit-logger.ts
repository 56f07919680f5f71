import { logger as rootLogger, type Logger } from "../observability/logger.js";
import type { DataSource } from "../mapping/types.js";
import type { EngineError } from "../errors.js";

export type AuditEventType =
  | "entry_skipped"
  | "extractor_failure"
  | "fallback_resolution"
  | "document_rejected";

export interface AuditEvent {
  eventType: AuditEventType;
  source: string;
  timestamp: string;
  sectionId?: string;
  dataSource?: DataSource;
  errorKind?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

type AuditSink = Pick<Logger, "info" | "warn" | "error">;

/**
 * Audit trail for everything the engine degraded instead of failing:
 * skipped entries, omitted sections, fallback terms and rejected documents.
 * Events never carry document content beyond codes and identifiers.
 */
export class AuditLogger {
  constructor(
    private readonly source = "clinical-terminology-engine",
    private readonly sink: AuditSink = rootLogger
  ) {}

  logEntrySkipped(sectionId: string, dataSource: DataSource, err: EngineError, elementId: string | null): void {
    const event = this.event("entry_skipped", {
      sectionId,
      dataSource,
      errorKind: err.kind,
      error: err.message,
      metadata: { elementId },
    });
    this.sink.warn({ event: event.eventType, ...event }, `Skipped ${sectionId} entry from ${dataSource}: ${err.message}`);
  }

  logExtractorFailure(sectionId: string, dataSource: DataSource, err: EngineError): void {
    const event = this.event("extractor_failure", {
      sectionId,
      dataSource,
      errorKind: err.kind,
      error: err.message,
    });
    this.sink.error({ event: event.eventType, ...event }, `Section ${sectionId} omitted: ${err.message}`);
  }

  logFallbackResolution(code: string, codeSystemOid: string, reason: EngineError): void {
    const event = this.event("fallback_resolution", {
      errorKind: reason.kind,
      error: reason.message,
      metadata: { code, codeSystemOid },
    });
    this.sink.info({ event: event.eventType, ...event }, `Fallback display for ${code} (${codeSystemOid})`);
  }

  logDocumentRejected(dataSource: DataSource, err: EngineError): void {
    const event = this.event("document_rejected", {
      dataSource,
      errorKind: err.kind,
      error: err.message,
    });
    this.sink.error({ event: event.eventType, ...event }, `Document rejected: ${err.message}`);
  }

  private event(eventType: AuditEventType, fields: Omit<AuditEvent, "eventType" | "source" | "timestamp">): AuditEvent {
    return {
      eventType,
      source: this.source,
      timestamp: new Date().toISOString(),
      ...fields,
    };
  }
}
