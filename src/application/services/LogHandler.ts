import { SourceLocation } from "../../domain/entities/LogRecord";
import { Severity, SeverityComparator } from "../../domain/value-objects/Severity";
import { AppendLogRecordRequest } from "../use-cases/AppendLogRecordUseCase";
import { SettingsStore } from "./SettingsStore";

export interface LogIngestor {
  append(request: AppendLogRecordRequest): void;
}

type CallSite = (...args: never[]) => unknown;

const STACK_FRAME = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/**
 * Front-end bound to one log id. Application code calls the severity
 * methods; records below the effective level are discarded here.
 */
export class LogHandler {
  public metadata: Record<string, string> = {};
  private ownLevel: Severity;

  constructor(
    public readonly label: string,
    private readonly logName: string,
    private readonly ingestor: LogIngestor,
    private readonly settings: SettingsStore
  ) {
    this.ownLevel = settings.get().defaultLogLevel;
  }

  public get logLevel(): Severity {
    return this.settings.get().forcedLogLevel ?? this.ownLevel;
  }

  public set logLevel(level: Severity) {
    this.ownLevel = level;
  }

  public isEnabled(severity: Severity): boolean {
    return SeverityComparator.isAtLeast(severity, this.logLevel);
  }

  public log(
    severity: Severity,
    message: string,
    metadata?: Record<string, string>,
    source?: SourceLocation
  ): void {
    this.write(severity, message, metadata, source, LogHandler.prototype.log);
  }

  public debug(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.DEBUG, message, metadata, undefined, LogHandler.prototype.debug);
  }

  public info(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.INFO, message, metadata, undefined, LogHandler.prototype.info);
  }

  public notice(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.NOTICE, message, metadata, undefined, LogHandler.prototype.notice);
  }

  public warning(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.WARNING, message, metadata, undefined, LogHandler.prototype.warning);
  }

  public error(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.ERROR, message, metadata, undefined, LogHandler.prototype.error);
  }

  public critical(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.CRITICAL, message, metadata, undefined, LogHandler.prototype.critical);
  }

  public alert(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.ALERT, message, metadata, undefined, LogHandler.prototype.alert);
  }

  public emergency(message: string, metadata?: Record<string, string>): void {
    this.write(Severity.EMERGENCY, message, metadata, undefined, LogHandler.prototype.emergency);
  }

  private write(
    severity: Severity,
    message: string,
    metadata: Record<string, string> | undefined,
    source: SourceLocation | undefined,
    callSite: CallSite
  ): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const sourceLocation =
      source ??
      (this.settings.get().includeSourceLocation ? LogHandler.locateCaller(callSite) : undefined);

    this.ingestor.append({
      logName: this.logName,
      severity,
      textPayload: message,
      labels: { ...this.metadata, ...metadata },
      sourceLocation,
      timestamp: new Date(),
    });
  }

  /**
   * Location of the code that called `callSite`, read from the V8 stack.
   */
  private static locateCaller(callSite: CallSite): SourceLocation | undefined {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, callSite);
    const frame = holder.stack?.split("\n")[1];
    const match = frame ? STACK_FRAME.exec(frame) : null;
    if (!match) {
      return undefined;
    }
    return {
      function: match[1] ?? "<anonymous>",
      file: match[2],
      line: match[3],
    };
  }
}
