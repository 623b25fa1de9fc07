import { LogQueueRepository, DrainResult, QueueSnapshot } from "../../domain/repositories/LogQueueRepository";
import { LogRecord } from "../../domain/entities/LogRecord";
import { LogUploader } from "../../domain/services/LogUploader";
import { EntriesWriteError, TokenRequestError, describeError } from "../../domain/errors/ShipperErrors";
import { Logger } from "../interfaces/Logger";
import { ShipperSettings } from "../interfaces/ShipperSettings";
import { SettingsStore } from "../services/SettingsStore";
import { applyEvictionPolicies, EvictionCounts } from "../services/EvictionPolicy";

export type UploadCycleStatus = "empty" | "delivered" | "requeued" | "storeFailed";

export interface UploadCycleReport {
  status: UploadCycleStatus;
  sent: number;
  malformed: number;
  dropped: EvictionCounts;
}

const NO_DROPS: EvictionCounts = { oversized: 0, overflow: 0, expired: 0 };

/**
 * One upload cycle: drain, evict, send, then commit the outcome back to
 * the queue. Eviction is never undone, whatever the upload result.
 */
export class UploadLogsUseCase {
  constructor(
    private readonly queueRepository: LogQueueRepository,
    private readonly uploader: LogUploader,
    private readonly settings: SettingsStore,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {}

  public async execute(): Promise<UploadCycleReport> {
    let drain: DrainResult;
    try {
      drain = await this.queueRepository.drainForUpload();
    } catch (error) {
      this.logger.error("Failed to read log queue", { error: describeError(error) });
      return { status: "storeFailed", sent: 0, malformed: 0, dropped: { ...NO_DROPS } };
    }

    if (drain.snapshot.lineCount === 0) {
      this.logger.debug("Nothing to upload");
      return { status: "empty", sent: 0, malformed: 0, dropped: { ...NO_DROPS } };
    }

    if (drain.malformed > 0) {
      this.logger.warn("Dropped malformed log queue lines", { count: drain.malformed });
    }

    const limits = this.settings.get();
    const { survivors, dropped } = applyEvictionPolicies(drain.records, limits, this.clock());
    this.logEviction(dropped, limits);

    const report = (status: UploadCycleStatus, sent: number): UploadCycleReport => ({
      status,
      sent,
      malformed: drain.malformed,
      dropped,
    });

    if (survivors.length === 0) {
      this.logger.info("Nothing to upload");
      const committed = await this.commit(drain.snapshot, []);
      return report(committed ? "empty" : "storeFailed", 0);
    }

    const result = await this.uploader.write(survivors);

    if (result.success) {
      this.logger.info("Log records uploaded", { count: survivors.length });
      const committed = await this.commit(drain.snapshot, []);
      return report(committed ? "delivered" : "storeFailed", survivors.length);
    }

    this.logUploadFailure(result.error, survivors.length);
    const committed = await this.commit(drain.snapshot, survivors);
    return report(committed ? "requeued" : "storeFailed", 0);
  }

  private async commit(snapshot: QueueSnapshot, undelivered: LogRecord[]): Promise<boolean> {
    try {
      await this.queueRepository.commit(snapshot, undelivered);
      return true;
    } catch (error) {
      this.logger.error("Failed to rewrite log queue", {
        error: describeError(error),
        undelivered: undelivered.length,
      });
      return false;
    }
  }

  private logEviction(dropped: EvictionCounts, limits: Readonly<ShipperSettings>): void {
    if (dropped.oversized > 0) {
      this.logger.warn("Evicted oversized log records", {
        count: dropped.oversized,
        maxLogEntrySize: limits.maxLogEntrySize,
      });
    }
    if (dropped.overflow > 0) {
      this.logger.warn("Evicted oldest log records over the queue size limit", {
        count: dropped.overflow,
        maxLogSize: limits.maxLogSize,
      });
    }
    if (dropped.expired > 0) {
      this.logger.warn("Evicted log records past the retention period", {
        count: dropped.expired,
        retentionPeriod: limits.retentionPeriod,
      });
    }
  }

  private logUploadFailure(error: Error, count: number): void {
    if (error instanceof EntriesWriteError && error.isPrecondition) {
      this.logger.debug("Upload skipped", { reason: error.kind, count });
      return;
    }
    const kind =
      error instanceof EntriesWriteError || error instanceof TokenRequestError
        ? error.kind
        : error.name;
    this.logger.error("Log upload failed, records kept for the next cycle", {
      kind,
      error: error.message,
      count,
    });
  }
}
