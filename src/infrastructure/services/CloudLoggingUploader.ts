import { LogRecord } from "../../domain/entities/LogRecord";
import { LogUploader, UploadResult } from "../../domain/services/LogUploader";
import { TokenProvider } from "../../domain/services/TokenProvider";
import { AccessToken } from "../../domain/value-objects/AccessToken";
import { BackendErrorPayload, EntriesWriteError, describeError } from "../../domain/errors/ShipperErrors";
import { Logger } from "../../application/interfaces/Logger";
import { backendErrorSchema } from "./backendErrors";

export const DEFAULT_WRITE_ENDPOINT = "https://logging.googleapis.com/v2/entries:write";

export interface MonitoredResource {
  type: string;
  labels: Record<string, string>;
}

export interface WriteEntriesRequest {
  resource: MonitoredResource;
  entries: LogRecord[];
}

export interface CloudLoggingUploaderOptions {
  projectId: string;
  endpoint?: string;
  timeoutMs?: number;
  clock?: () => number;
}

export class CloudLoggingUploader implements LogUploader {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly tokenProvider: TokenProvider,
    private readonly logger: Logger,
    private readonly options: CloudLoggingUploaderOptions
  ) {
    this.endpoint = options.endpoint ?? DEFAULT_WRITE_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.clock = options.clock ?? Date.now;
  }

  public static globalResource(projectId: string): MonitoredResource {
    return { type: "global", labels: { project_id: projectId } };
  }

  public async write(entries: LogRecord[]): Promise<UploadResult> {
    if (entries.length === 0) {
      return {
        success: false,
        error: new EntriesWriteError("No entries to send", "noEntriesToSend"),
      };
    }

    let token: AccessToken;
    try {
      token = await this.tokenProvider.getToken();
    } catch (error) {
      return { success: false, error: error instanceof Error ? error : new Error(String(error)) };
    }

    if (token.isExpired(this.clock())) {
      return {
        success: false,
        error: new EntriesWriteError("Access token expired before sending", "tokenExpired"),
      };
    }

    return this.send(entries, token);
  }

  private async send(entries: LogRecord[], token: AccessToken): Promise<UploadResult> {
    const request: WriteEntriesRequest = {
      resource: CloudLoggingUploader.globalResource(this.options.projectId),
      entries,
    };

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token.value}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (error) {
      this.logger.warn("Log upload transport failure", {
        error: describeError(error),
        count: entries.length,
      });
      return {
        success: false,
        error: new EntriesWriteError(`Upload failed: ${describeError(error)}`, "transport", {
          originalError: error instanceof Error ? error : undefined,
        }),
      };
    } finally {
      clearTimeout(timeout);
    }

    const backendError = this.extractBackendError(body);
    if (backendError) {
      this.logger.warn("Log upload rejected by backend", {
        httpStatus: status,
        code: backendError.code,
        status: backendError.status,
        message: backendError.message,
      });
      return {
        success: false,
        error: new EntriesWriteError(`Upload rejected: ${backendError.message}`, "errorReceived", {
          httpStatus: status,
          backendError,
        }),
      };
    }

    if (!ok) {
      return {
        success: false,
        error: new EntriesWriteError(`Upload failed with HTTP ${status}`, "noDataReceived", {
          httpStatus: status,
        }),
      };
    }

    return { success: true };
  }

  private extractBackendError(body: string): BackendErrorPayload | undefined {
    if (body.trim().length === 0) {
      return undefined;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      return undefined;
    }
    const parsed = backendErrorSchema.safeParse(payload);
    return parsed.success ? parsed.data : undefined;
  }
}
