export { LogShipper, LogShipperSetupOptions, DEFAULT_QUEUE_FILE } from "./LogShipper";
export { Config, AppConfig } from "./infrastructure/config/Config";
export { loadServiceAccountCredentials } from "./infrastructure/config/CredentialsLoader";
export { WinstonLogger, WinstonLoggerOptions } from "./infrastructure/logging/WinstonLogger";
export { FileSystemLogQueueRepository } from "./infrastructure/repositories/FileSystemLogQueueRepository";
export {
  ServiceAccountTokenManager,
  LOGGING_WRITE_SCOPE,
} from "./infrastructure/services/ServiceAccountTokenManager";
export {
  CloudLoggingUploader,
  DEFAULT_WRITE_ENDPOINT,
} from "./infrastructure/services/CloudLoggingUploader";
export { Logger, LogMeta } from "./application/interfaces/Logger";
export { ShipperSettings, DEFAULT_SHIPPER_SETTINGS } from "./application/interfaces/ShipperSettings";
export { SettingsStore } from "./application/services/SettingsStore";
export { UploadScheduler } from "./application/services/UploadScheduler";
export { LogHandler } from "./application/services/LogHandler";
export { applyEvictionPolicies } from "./application/services/EvictionPolicy";
export {
  AppendLogRecordUseCase,
  AppendLogRecordRequest,
} from "./application/use-cases/AppendLogRecordUseCase";
export { UploadLogsUseCase, UploadCycleReport } from "./application/use-cases/UploadLogsUseCase";
export { LogRecord, LogRecords, SourceLocation } from "./domain/entities/LogRecord";
export { Severity, SeverityComparator } from "./domain/value-objects/Severity";
export { AccessToken } from "./domain/value-objects/AccessToken";
export { ServiceAccountCredentials } from "./domain/value-objects/ServiceAccountCredentials";
export * from "./domain/errors/ShipperErrors";
