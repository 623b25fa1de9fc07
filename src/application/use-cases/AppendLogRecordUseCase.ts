import { LogRecords, SourceLocation } from "../../domain/entities/LogRecord";
import { LogQueueRepository } from "../../domain/repositories/LogQueueRepository";
import { Severity, SeverityComparator } from "../../domain/value-objects/Severity";
import { describeError } from "../../domain/errors/ShipperErrors";
import { Logger } from "../interfaces/Logger";
import { SettingsStore } from "../services/SettingsStore";

export interface AppendLogRecordRequest {
  logName: string;
  severity: Severity;
  textPayload: string;
  labels?: Record<string, string>;
  sourceLocation?: SourceLocation;
  /** Omit to let the backend stamp the record on arrival. */
  timestamp?: Date;
}

export interface UploadTrigger {
  triggerNow(): void;
}

export class AppendLogRecordUseCase {
  constructor(
    private readonly queueRepository: LogQueueRepository,
    private readonly uploadTrigger: UploadTrigger,
    private readonly settings: SettingsStore,
    private readonly logger: Logger,
    private readonly clientIdentity: string
  ) {}

  /**
   * Queues one record. Resolves to whether the record was stored; never
   * rejects, so callers may ignore the returned promise.
   */
  public async execute(request: AppendLogRecordRequest): Promise<boolean> {
    const settings = this.settings.get();

    let stored = false;
    try {
      const record = LogRecords.create(
        {
          ...request,
          sourceLocation: settings.includeSourceLocation ? request.sourceLocation : undefined,
        },
        this.clientIdentity
      );
      stored = await this.queueRepository.append(record);
    } catch (error) {
      this.logger.error("Failed to queue log record", {
        error: describeError(error),
        logName: request.logName,
      });
    }

    if (
      settings.signalingSeverity !== null &&
      SeverityComparator.isAtLeast(request.severity, settings.signalingSeverity)
    ) {
      this.uploadTrigger.triggerNow();
    }

    return stored;
  }
}
