import { Config } from "./infrastructure/config/Config";
import { loadServiceAccountCredentials } from "./infrastructure/config/CredentialsLoader";
import { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
import { FileSystemLogQueueRepository } from "./infrastructure/repositories/FileSystemLogQueueRepository";
import { ServiceAccountTokenManager } from "./infrastructure/services/ServiceAccountTokenManager";
import { CloudLoggingUploader } from "./infrastructure/services/CloudLoggingUploader";
import { Logger } from "./application/interfaces/Logger";
import { ShipperSettings } from "./application/interfaces/ShipperSettings";
import { SettingsStore } from "./application/services/SettingsStore";
import { UploadScheduler } from "./application/services/UploadScheduler";
import { LogHandler, LogIngestor } from "./application/services/LogHandler";
import {
  AppendLogRecordRequest,
  AppendLogRecordUseCase,
} from "./application/use-cases/AppendLogRecordUseCase";
import { UploadLogsUseCase } from "./application/use-cases/UploadLogsUseCase";
import { ServiceAccountCredentials } from "./domain/value-objects/ServiceAccountCredentials";
import { tmpdir } from "os";
import { join } from "path";

export interface LogShipperSetupOptions {
  credentialsFile: string;
  queueFile?: string;
  settings?: Partial<ShipperSettings>;
  logger?: Logger;
  endpoint?: string;
  timeoutMs?: number;
}

export const DEFAULT_QUEUE_FILE = join(tmpdir(), "CloudLogEntries.jsonl");

/**
 * Wires the queue, token manager, uploader and scheduler together and is
 * the ingestion entry point for the logging front-end.
 */
export class LogShipper implements LogIngestor {
  private readonly pendingAppends = new Set<Promise<boolean>>();
  private isShutDown = false;

  private constructor(
    public readonly credentials: ServiceAccountCredentials,
    private readonly settingsStore: SettingsStore,
    private readonly queueRepository: FileSystemLogQueueRepository,
    private readonly scheduler: UploadScheduler,
    private readonly appendUseCase: AppendLogRecordUseCase,
    private readonly logger: Logger
  ) {}

  /**
   * Loads credentials, prepares the queue file, arms the upload timer and
   * requests an upload right away so records left by a previous run go out.
   */
  public static async setup(options: LogShipperSetupOptions): Promise<LogShipper> {
    const logger = options.logger ?? new WinstonLogger();
    const credentials = await loadServiceAccountCredentials(options.credentialsFile);
    const settingsStore = new SettingsStore(options.settings);

    const queueRepository = new FileSystemLogQueueRepository(
      options.queueFile ?? DEFAULT_QUEUE_FILE,
      settingsStore,
      logger
    );
    await queueRepository.prepare();

    const tokenManager = new ServiceAccountTokenManager(credentials, logger, {
      timeoutMs: options.timeoutMs,
    });
    const uploader = new CloudLoggingUploader(tokenManager, logger, {
      projectId: credentials.projectId,
      endpoint: options.endpoint,
      timeoutMs: options.timeoutMs,
    });

    const uploadLogs = new UploadLogsUseCase(queueRepository, uploader, settingsStore, logger);
    const scheduler = new UploadScheduler(uploadLogs, settingsStore, logger);
    const appendUseCase = new AppendLogRecordUseCase(
      queueRepository,
      scheduler,
      settingsStore,
      logger,
      credentials.clientEmail
    );

    const shipper = new LogShipper(
      credentials,
      settingsStore,
      queueRepository,
      scheduler,
      appendUseCase,
      logger
    );

    scheduler.start();
    logger.info("Log shipper started", {
      queueFile: queueRepository.path,
      projectId: credentials.projectId,
    });
    shipper.upload();
    return shipper;
  }

  public static fromConfig(config: Config, logger?: Logger): Promise<LogShipper> {
    const appConfig = config.get();
    return LogShipper.setup({
      credentialsFile: appConfig.credentials.file,
      queueFile: appConfig.queue.file,
      settings: appConfig.shipper,
      endpoint: appConfig.upload.endpoint,
      timeoutMs: appConfig.upload.timeoutMs,
      logger:
        logger ?? new WinstonLogger({ level: appConfig.logging.level, file: appConfig.logging.file }),
    });
  }

  public get settings(): Readonly<ShipperSettings> {
    return this.settingsStore.get();
  }

  /**
   * Queues one record and returns immediately.
   */
  public append(request: AppendLogRecordRequest): void {
    if (this.isShutDown) {
      this.logger.warn("Log shipper is shut down, record dropped", { logName: request.logName });
      return;
    }
    const pending = this.appendUseCase.execute(request);
    this.pendingAppends.add(pending);
    void pending.finally(() => this.pendingAppends.delete(pending));
  }

  /**
   * Requests an upload cycle now.
   */
  public upload(): void {
    this.scheduler.triggerNow();
  }

  public updateSettings(changes: Partial<ShipperSettings>): Readonly<ShipperSettings> {
    return this.settingsStore.update(changes);
  }

  public handler(label: string): LogHandler {
    return new LogHandler(label, this.credentials.logName(label), this, this.settingsStore);
  }

  /**
   * Resolves once queued appends and any running or pending upload cycle
   * have finished.
   */
  public async flush(): Promise<void> {
    await Promise.all([...this.pendingAppends]);
    await this.scheduler.whenIdle();
    await this.queueRepository.idle();
  }

  public async getStats(): Promise<{
    queue: { bytes: number; lines: number };
    uploading: boolean;
    lastCycle?: ReturnType<UploadScheduler["getLastReport"]>;
  }> {
    return {
      queue: await this.queueRepository.getStats(),
      uploading: this.scheduler.isUploading(),
      lastCycle: this.scheduler.getLastReport(),
    };
  }

  public async shutdown(): Promise<void> {
    if (this.isShutDown) {
      return;
    }
    this.isShutDown = true;
    await Promise.all([...this.pendingAppends]);
    await this.scheduler.stop();
    await this.queueRepository.idle();
    this.logger.info("Log shipper stopped");
  }
}
