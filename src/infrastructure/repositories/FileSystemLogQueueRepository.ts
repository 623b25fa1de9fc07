import { promises as fs } from "fs";
import { dirname } from "path";
import { randomBytes } from "crypto";
import { LogRecord, LogRecords } from "../../domain/entities/LogRecord";
import {
  DrainResult,
  LogQueueRepository,
  QueueSnapshot,
} from "../../domain/repositories/LogQueueRepository";
import { StoreUnavailableError, describeError } from "../../domain/errors/ShipperErrors";
import { Logger } from "../../application/interfaces/Logger";
import { SettingsStore } from "../../application/services/SettingsStore";
import { SerialExecutor } from "../../application/services/SerialExecutor";

const NEWLINE = 0x0a;

/**
 * Newline-delimited JSON queue file. All access goes through one serial
 * executor, and rewrites replace the file by rename so a reader only ever
 * sees the old or the new content.
 */
export class FileSystemLogQueueRepository implements LogQueueRepository {
  private readonly executor = new SerialExecutor();

  constructor(
    private readonly filePath: string,
    private readonly settings: SettingsStore,
    private readonly logger: Logger
  ) {}

  public get path(): string {
    return this.filePath;
  }

  /**
   * Creates the directory and an empty queue file when missing.
   */
  public prepare(): Promise<void> {
    return this.executor.run(async () => {
      await this.ensureFileExists();
    });
  }

  public append(record: LogRecord): Promise<boolean> {
    return this.executor.run(async () => {
      const line = LogRecords.serialize(record) + "\n";
      const size = Buffer.byteLength(line, "utf8");
      const { maxLogEntrySize } = this.settings.get();

      if (maxLogEntrySize !== null && size > maxLogEntrySize) {
        this.logger.warn("Dropped log record over the entry size limit", {
          size,
          maxLogEntrySize,
          logName: record.logName,
        });
        return false;
      }

      await this.ensureFileExists();
      try {
        // A crash can leave a torn last line; keep it apart from the new record.
        const separator = (await this.endsWithPartialLine()) ? "\n" : "";
        await fs.appendFile(this.filePath, separator + line, "utf8");
      } catch (error) {
        throw this.unavailable("Failed to append to log queue", error);
      }
      return true;
    });
  }

  public drainForUpload(): Promise<DrainResult> {
    return this.executor.run(async () => {
      const content = await this.readContent();
      const lines = content
        .toString("utf8")
        .split("\n")
        .filter((line) => line.trim().length > 0);

      const records: LogRecord[] = [];
      let malformed = 0;
      for (const line of lines) {
        const record = LogRecords.parse(line);
        if (record) {
          records.push(record);
        } else {
          malformed++;
        }
      }

      return {
        records,
        malformed,
        snapshot: { byteLength: content.length, lineCount: lines.length },
      };
    });
  }

  public commit(snapshot: QueueSnapshot, undelivered: LogRecord[]): Promise<void> {
    return this.executor.run(async () => {
      if (undelivered.length === snapshot.lineCount && snapshot.lineCount > 0) {
        // Nothing was delivered or excluded; the file already says this.
        return;
      }

      const current = await this.readContent();
      const appendedSince = current.subarray(Math.min(snapshot.byteLength, current.length));
      const kept = undelivered.map((record) => LogRecords.serialize(record) + "\n").join("");

      await this.replaceContent(Buffer.concat([Buffer.from(kept, "utf8"), appendedSince]));
      this.logger.debug("Log queue rewritten", {
        removedLines: snapshot.lineCount - undelivered.length,
        keptLines: undelivered.length,
        appendedBytes: appendedSince.length,
      });
    });
  }

  public idle(): Promise<void> {
    return this.executor.idle();
  }

  public getStats(): Promise<{ bytes: number; lines: number }> {
    return this.executor.run(async () => {
      const content = await this.readContent();
      let lines = 0;
      for (const byte of content) {
        if (byte === NEWLINE) {
          lines++;
        }
      }
      return { bytes: content.length, lines };
    });
  }

  private async ensureFileExists(): Promise<void> {
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      // "a" creates the file without touching existing content.
      await fs.writeFile(this.filePath, "", { flag: "a" });
    } catch (error) {
      throw this.unavailable("Failed to prepare log queue file", error);
    }
  }

  private async endsWithPartialLine(): Promise<boolean> {
    const handle = await fs.open(this.filePath, "r");
    try {
      const { size } = await handle.stat();
      if (size === 0) {
        return false;
      }
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] !== NEWLINE;
    } finally {
      await handle.close();
    }
  }

  private async readContent(): Promise<Buffer> {
    try {
      return await fs.readFile(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return Buffer.alloc(0);
      }
      throw this.unavailable("Failed to read log queue", error);
    }
  }

  private async replaceContent(content: Buffer): Promise<void> {
    const tempPath = `${this.filePath}.${randomBytes(6).toString("hex")}.tmp`;
    try {
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug("Failed to remove temporary queue file", {
          tempPath,
          error: describeError(cleanupError),
        });
      });
      throw this.unavailable("Failed to rewrite log queue", error);
    }
  }

  private unavailable(message: string, error: unknown): StoreUnavailableError {
    return new StoreUnavailableError(
      `${message}: ${describeError(error)}`,
      this.filePath,
      error instanceof Error ? error : undefined
    );
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
