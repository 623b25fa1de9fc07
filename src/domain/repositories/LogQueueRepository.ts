import { LogRecord } from "../entities/LogRecord";

/**
 * Position of a drain in the queue file. Everything before `byteLength`
 * was read by the drain; anything after it was appended later.
 */
export interface QueueSnapshot {
  readonly byteLength: number;
  readonly lineCount: number;
}

export interface DrainResult {
  readonly records: LogRecord[];
  /** Lines that could not be parsed. They are dropped for good on commit. */
  readonly malformed: number;
  readonly snapshot: QueueSnapshot;
}

export interface LogQueueRepository {
  /**
   * Append one record to the end of the queue. Records larger than the
   * per-entry limit are dropped and `false` is returned.
   */
  append(record: LogRecord): Promise<boolean>;

  /**
   * Read the whole queue, in append order.
   */
  drainForUpload(): Promise<DrainResult>;

  /**
   * Replace the drained part of the queue with `undelivered`, keeping
   * whatever was appended after the snapshot. An empty `undelivered`
   * removes the drained part entirely.
   */
  commit(snapshot: QueueSnapshot, undelivered: LogRecord[]): Promise<void>;

  /**
   * Resolves once all queued store operations have completed.
   */
  idle(): Promise<void>;
}
