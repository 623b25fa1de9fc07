import { LogRecord } from "../entities/LogRecord";
import {
  EntriesWriteError,
  TokenRequestError,
} from "../errors/ShipperErrors";

export type UploadResult =
  | { success: true }
  | { success: false; error: EntriesWriteError | TokenRequestError | Error };

export interface LogUploader {
  /**
   * Send all entries in a single authenticated batch write. Never retries
   * and never rejects: failures are reported in the result.
   */
  write(entries: LogRecord[]): Promise<UploadResult>;
}
