import { createHash } from "crypto";
import { z } from "zod";
import { Severity } from "../value-objects/Severity";

export interface SourceLocation {
  file: string;
  line: string;
  function: string;
}

/**
 * One queued log entry. Stored one-per-line in the durable queue and sent
 * as-is in the `entries` array of a batch write.
 */
export interface LogRecord {
  logName: string;
  /** ISO-8601 with fractional seconds. Absent means the backend stamps it. */
  timestamp?: string;
  severity: Severity;
  insertId?: string;
  labels?: Record<string, string>;
  sourceLocation?: SourceLocation;
  textPayload: string;
}

export interface NewLogRecord {
  logName: string;
  severity: Severity;
  textPayload: string;
  labels?: Record<string, string>;
  sourceLocation?: SourceLocation;
  timestamp?: Date;
}

const logRecordSchema = z.object({
  logName: z.string(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  severity: z.nativeEnum(Severity).default(Severity.DEFAULT),
  insertId: z.string().optional(),
  labels: z.record(z.string()).optional(),
  sourceLocation: z
    .object({ file: z.string(), line: z.string(), function: z.string() })
    .optional(),
  textPayload: z.string(),
});

const INSERT_ID_LENGTH = 32;

export class LogRecords {
  /**
   * Builds a record ready for the queue. `clientIdentity` feeds the
   * insertId so two clients emitting the same text at the same instant
   * are not collapsed by the backend.
   */
  public static create(input: NewLogRecord, clientIdentity: string): LogRecord {
    const timestamp = input.timestamp?.toISOString();
    const labels =
      input.labels && Object.keys(input.labels).length > 0 ? { ...input.labels } : undefined;

    const record: LogRecord = {
      logName: input.logName,
      severity: input.severity,
      textPayload: input.textPayload,
    };
    if (timestamp !== undefined) {
      record.timestamp = timestamp;
      record.insertId = LogRecords.insertId(input.textPayload, clientIdentity, timestamp);
    }
    if (labels) {
      record.labels = labels;
    }
    if (input.sourceLocation) {
      record.sourceLocation = { ...input.sourceLocation };
    }
    return record;
  }

  public static insertId(textPayload: string, clientIdentity: string, timestamp: string): string {
    return createHash("sha256")
      .update(`${textPayload}\u0000${clientIdentity}\u0000${timestamp}`)
      .digest("hex")
      .slice(0, INSERT_ID_LENGTH);
  }

  public static serialize(record: LogRecord): string {
    return JSON.stringify(record);
  }

  /** Size in bytes of the record's line in the queue file, newline included. */
  public static serializedSize(record: LogRecord): number {
    return Buffer.byteLength(LogRecords.serialize(record), "utf8") + 1;
  }

  /** Returns null for a line that is not a valid record. */
  public static parse(line: string): LogRecord | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = logRecordSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  /** Age in milliseconds, or undefined for records without a timestamp. */
  public static ageMs(record: LogRecord, now: number): number | undefined {
    if (record.timestamp === undefined) {
      return undefined;
    }
    return now - Date.parse(record.timestamp);
  }
}
