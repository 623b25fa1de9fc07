import * as dotenv from "dotenv";
import { tmpdir } from "os";
import { join } from "path";
import { Severity, SeverityComparator } from "../../domain/value-objects/Severity";
import {
  DEFAULT_SHIPPER_SETTINGS,
  ShipperSettings,
} from "../../application/interfaces/ShipperSettings";

// Load environment variables
dotenv.config();

const DISABLED = "none";
// setTimeout clamps longer delays to 1 ms.
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export interface AppConfig {
  credentials: {
    file: string;
  };
  queue: {
    file: string;
  };
  upload: {
    endpoint: string;
    timeoutMs: number;
  };
  shipper: ShipperSettings;
  logging: {
    level: string;
    file?: string;
  };
  environment: string;
}

export class Config {
  private readonly config: AppConfig;
  private readonly errors: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig();
  }

  public static fromEnv(env: NodeJS.ProcessEnv = process.env): Config {
    const config = new Config(env);
    config.validate();
    return config;
  }

  public get(): AppConfig {
    return this.config;
  }

  private loadConfig(): AppConfig {
    const defaults = DEFAULT_SHIPPER_SETTINGS;
    return {
      credentials: {
        file: this.getEnvVar("CLOUD_LOGGING_CREDENTIALS_FILE", ""),
      },
      queue: {
        file: this.getEnvVar("LOG_QUEUE_FILE", join(tmpdir(), "CloudLogEntries.jsonl")),
      },
      upload: {
        endpoint: this.getEnvVar(
          "CLOUD_LOGGING_ENDPOINT",
          "https://logging.googleapis.com/v2/entries:write"
        ),
        timeoutMs: this.getNumber("UPLOAD_TIMEOUT_MS", 30000) ?? 30000,
      },
      shipper: {
        maxLogEntrySize: this.getNumber("MAX_LOG_ENTRY_SIZE", defaults.maxLogEntrySize),
        maxLogSize: this.getNumber("MAX_LOG_SIZE", defaults.maxLogSize),
        retentionPeriod: this.getNumber("LOG_RETENTION_PERIOD", defaults.retentionPeriod),
        uploadInterval: this.getNumber("UPLOAD_INTERVAL", defaults.uploadInterval),
        signalingSeverity: this.getSeverity("SIGNALING_SEVERITY", defaults.signalingSeverity),
        includeSourceLocation:
          this.getEnvVar("INCLUDE_SOURCE_LOCATION", String(defaults.includeSourceLocation)) ===
          "true",
        defaultLogLevel:
          this.getSeverity("DEFAULT_LOG_LEVEL", defaults.defaultLogLevel) ??
          defaults.defaultLogLevel,
        forcedLogLevel: this.getSeverity("FORCED_LOG_LEVEL", defaults.forcedLogLevel),
      },
      logging: {
        level: this.getEnvVar("LOG_LEVEL", "info"),
        file: this.env.LOG_FILE,
      },
      environment: this.getEnvVar("NODE_ENV", "development"),
    };
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined) {
      return defaultValue;
    }
    return value;
  }

  private getNumber(key: string, defaultValue: number | null): number | null {
    const value = this.env[key];
    if (value === undefined) {
      return defaultValue;
    }
    if (value.trim().toLowerCase() === DISABLED) {
      return null;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.errors.push(`${key} must be a number or "${DISABLED}"`);
      return defaultValue;
    }
    return parsed;
  }

  private getSeverity(key: string, defaultValue: Severity | null): Severity | null {
    const value = this.env[key];
    if (value === undefined) {
      return defaultValue;
    }
    if (value.trim().toLowerCase() === DISABLED) {
      return null;
    }
    try {
      return SeverityComparator.parse(value);
    } catch (error) {
      this.errors.push(`${key}: ${error instanceof Error ? error.message : String(error)}`);
      return defaultValue;
    }
  }

  public validate(): void {
    const errors = [...this.errors];
    const { credentials, shipper, upload, queue } = this.config;

    if (!credentials.file) {
      errors.push("CLOUD_LOGGING_CREDENTIALS_FILE is required");
    }

    if (!queue.file) {
      errors.push("LOG_QUEUE_FILE is required");
    }

    if (!isPositive(upload.timeoutMs)) {
      errors.push("UPLOAD_TIMEOUT_MS must be positive");
    } else if (upload.timeoutMs > MAX_TIMEOUT_MS) {
      errors.push(`UPLOAD_TIMEOUT_MS must not exceed ${MAX_TIMEOUT_MS}`);
    }

    const limits: Array<[string, number | null]> = [
      ["MAX_LOG_ENTRY_SIZE", shipper.maxLogEntrySize],
      ["MAX_LOG_SIZE", shipper.maxLogSize],
      ["LOG_RETENTION_PERIOD", shipper.retentionPeriod],
      ["UPLOAD_INTERVAL", shipper.uploadInterval],
    ];
    for (const [key, value] of limits) {
      if (value !== null && !isPositive(value)) {
        errors.push(`${key} must be positive`);
      }
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
