export type LogMeta = Record<string, unknown>;

/**
 * Diagnostics of the shipper itself. Records handed to the shipper for
 * upload never go through this port.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
