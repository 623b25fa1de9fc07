import { Severity } from "../../domain/value-objects/Severity";

/**
 * Runtime knobs. `null` disables the corresponding limit or trigger.
 */
export interface ShipperSettings {
  /** Bytes per serialized record, newline included. */
  maxLogEntrySize: number | null;
  /** Bytes for the whole queue file. */
  maxLogSize: number | null;
  /** Seconds. */
  retentionPeriod: number | null;
  /** Seconds between scheduled uploads. */
  uploadInterval: number | null;
  /** Records at or above this severity request an immediate upload. */
  signalingSeverity: Severity | null;
  includeSourceLocation: boolean;
  defaultLogLevel: Severity;
  /** Overrides every handler's own level when set. */
  forcedLogLevel: Severity | null;
}

export const DEFAULT_SHIPPER_SETTINGS: Readonly<ShipperSettings> = Object.freeze({
  maxLogEntrySize: 256_000,
  maxLogSize: 10_000_000,
  retentionPeriod: 30 * 24 * 3600,
  uploadInterval: 3600,
  signalingSeverity: Severity.CRITICAL,
  includeSourceLocation: true,
  defaultLogLevel: Severity.INFO,
  forcedLogLevel: null,
});
