import { Logger } from "../interfaces/Logger";
import { ShipperSettings } from "../interfaces/ShipperSettings";
import { UploadTrigger } from "../use-cases/AppendLogRecordUseCase";
import { UploadCycleReport } from "../use-cases/UploadLogsUseCase";
import { SettingsStore } from "./SettingsStore";
import { describeError } from "../../domain/errors/ShipperErrors";

export interface UploadCycleRunner {
  execute(): Promise<UploadCycleReport>;
}

type CycleReason = "interval" | "trigger";

// Longest delay setTimeout accepts; larger values are clamped to 1 ms.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Decides when upload cycles run. Cycles never overlap: a request that
 * arrives while one is running is remembered once and served right after.
 */
export class UploadScheduler implements UploadTrigger {
  private timer?: NodeJS.Timeout;
  private intervalSeconds: number | null = null;
  private inFlight?: Promise<void>;
  private pending = false;
  private isStarted = false;
  private isStopped = false;
  private lastReport?: UploadCycleReport;

  private readonly handleSettingsChange = (
    next: Readonly<ShipperSettings>,
    previous: Readonly<ShipperSettings>
  ): void => {
    if (next.uploadInterval !== previous.uploadInterval) {
      this.scheduleInterval(next.uploadInterval);
    }
  };

  constructor(
    private readonly uploadCycle: UploadCycleRunner,
    private readonly settings: SettingsStore,
    private readonly logger: Logger
  ) {}

  public start(): void {
    if (this.isStarted) {
      this.logger.warn("Upload scheduler is already running");
      return;
    }
    this.isStarted = true;
    this.isStopped = false;
    this.settings.onChange(this.handleSettingsChange);
    this.scheduleInterval(this.settings.get().uploadInterval);
  }

  public async stop(): Promise<void> {
    this.isStopped = true;
    this.isStarted = false;
    this.pending = false;
    this.settings.offChange(this.handleSettingsChange);
    this.clearTimer();
    await this.whenIdle();
  }

  /**
   * Re-arms the recurring timer. `null` (or a non-positive or non-finite value) leaves
   * only manual and severity-triggered uploads. A coalesced request that is
   * already pending is kept.
   */
  public scheduleInterval(seconds: number | null): void {
    this.intervalSeconds = seconds;
    this.clearTimer();

    if (seconds === null || !Number.isFinite(seconds) || seconds <= 0 || this.isStopped) {
      this.logger.debug("Recurring upload disabled");
      return;
    }

    this.armTimer(seconds * 1000);
    this.logger.debug("Recurring upload scheduled", { intervalSeconds: seconds });
  }

  /**
   * Runs a cycle as soon as possible and restarts the interval countdown.
   */
  public triggerNow(): void {
    if (this.isStopped) {
      return;
    }
    if (this.timer) {
      this.scheduleInterval(this.intervalSeconds);
    }
    this.requestCycle("trigger");
  }

  public isUploading(): boolean {
    return this.inFlight !== undefined;
  }

  public getLastReport(): UploadCycleReport | undefined {
    return this.lastReport;
  }

  /**
   * Resolves when no cycle is running or pending.
   */
  public whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private requestCycle(reason: CycleReason): void {
    if (this.inFlight) {
      this.pending = true;
      this.logger.debug("Upload already in progress, coalescing request", { reason });
      return;
    }
    this.inFlight = this.runCycles(reason);
  }

  private async runCycles(reason: CycleReason): Promise<void> {
    try {
      let currentReason: CycleReason = reason;
      do {
        this.pending = false;
        await this.runCycle(currentReason);
        currentReason = "trigger";
      } while (this.pending && !this.isStopped);
    } finally {
      this.inFlight = undefined;
    }
  }

  private async runCycle(reason: CycleReason): Promise<void> {
    this.logger.debug("Upload cycle started", { reason });
    try {
      this.lastReport = await this.uploadCycle.execute();
      this.logger.debug("Upload cycle finished", { ...this.lastReport });
    } catch (error) {
      this.logger.error("Upload cycle failed", { error: describeError(error) });
    }
  }

  /**
   * Counts `remainingMs` down in steps Node's timers can hold, then runs a
   * cycle and starts the next full interval.
   */
  private armTimer(remainingMs: number): void {
    const step = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => {
      const left = remainingMs - step;
      if (left > 0) {
        this.armTimer(left);
        return;
      }
      if (this.intervalSeconds !== null && this.intervalSeconds > 0) {
        this.armTimer(this.intervalSeconds * 1000);
      }
      this.requestCycle("interval");
    }, step);
    this.timer.unref?.();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
