import { LogRecord, LogRecords } from "../../domain/entities/LogRecord";

export interface EvictionLimits {
  maxLogEntrySize: number | null;
  maxLogSize: number | null;
  /** Seconds. */
  retentionPeriod: number | null;
}

export interface EvictionCounts {
  oversized: number;
  overflow: number;
  expired: number;
}

export interface EvictionOutcome {
  survivors: LogRecord[];
  dropped: EvictionCounts;
}

/**
 * Applies, in order: the per-entry size limit, the total size limit
 * (oldest first) and the retention period. Input order is kept; it is the
 * only priority signal.
 */
export function applyEvictionPolicies(
  batch: LogRecord[],
  limits: EvictionLimits,
  now: number = Date.now()
): EvictionOutcome {
  const dropped: EvictionCounts = { oversized: 0, overflow: 0, expired: 0 };

  let sized = batch.map((record) => ({ record, size: LogRecords.serializedSize(record) }));

  const { maxLogEntrySize, maxLogSize, retentionPeriod } = limits;

  if (maxLogEntrySize !== null) {
    const kept = sized.filter((item) => item.size <= maxLogEntrySize);
    dropped.oversized = sized.length - kept.length;
    sized = kept;
  }

  if (maxLogSize !== null) {
    let total = sized.reduce((sum, item) => sum + item.size, 0);
    let cut = 0;
    while (total > maxLogSize && cut < sized.length) {
      total -= sized[cut].size;
      cut++;
    }
    dropped.overflow = cut;
    sized = sized.slice(cut);
  }

  let survivors = sized.map((item) => item.record);

  if (retentionPeriod !== null) {
    const maxAgeMs = retentionPeriod * 1000;
    const kept = survivors.filter((record) => {
      const age = LogRecords.ageMs(record, now);
      return age === undefined || age <= maxAgeMs;
    });
    dropped.expired = survivors.length - kept.length;
    survivors = kept;
  }

  return { survivors, dropped };
}

export function totalDropped(counts: EvictionCounts): number {
  return counts.oversized + counts.overflow + counts.expired;
}
