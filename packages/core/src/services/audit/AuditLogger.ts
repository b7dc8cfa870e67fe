import { promises as fs } from "node:fs";
import path from "node:path";
import { SerialQueue, sliceCodePoints, type CliaErrorKind, type EndpointName } from "@clia/shared";
import type { Logger } from "../../logging/Logger.js";

export const AUDIT_QUERY_LIMIT = 256;

export type AuditOutcome = "success" | CliaErrorKind | "InternalError";

export interface AuditEvent {
  endpoint: EndpointName | string;
  method: string;
  caller: number | null;
  outcome: AuditOutcome;
  query?: string;
}

export interface AuditRecord extends AuditEvent {
  timestamp: string;
}

export interface AuditLoggerOptions {
  file: string;
  enabled: boolean;
  /** Receives write failures; audit problems never reach the caller. */
  fallback: Logger;
  now?: () => Date;
}

export const truncateForAudit = (text: string, limit = AUDIT_QUERY_LIMIT): string => sliceCodePoints(text, limit);

/**
 * Append-only JSONL audit trail, one record per inbound call. Records are
 * written one at a time in the order they were submitted.
 */
export class AuditLogger {
  private queue = new SerialQueue();
  private dirReady = false;
  private readonly now: () => Date;

  constructor(private options: AuditLoggerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get file(): string {
    return this.options.file;
  }

  record(event: AuditEvent): void {
    if (!this.options.enabled) return;
    const record: AuditRecord = {
      timestamp: this.now().toISOString(),
      endpoint: event.endpoint,
      method: event.method,
      caller: event.caller,
      outcome: event.outcome,
      ...(event.query !== undefined ? { query: truncateForAudit(event.query) } : {}),
    };
    this.queue
      .run(() => this.append(`${JSON.stringify(record)}\n`))
      .catch((error: unknown) => {
        this.options.fallback.warn(
          { err: error, file: this.options.file, endpoint: record.endpoint, method: record.method },
          "audit record could not be written",
        );
      });
  }

  /** Resolves once every record submitted so far has been written or reported. */
  async flush(): Promise<void> {
    await this.queue.drain();
  }

  private async append(line: string): Promise<void> {
    if (!this.dirReady) {
      await fs.mkdir(path.dirname(this.options.file), { recursive: true });
      this.dirReady = true;
    }
    await fs.appendFile(this.options.file, line, "utf8");
  }
}
