import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import { Logger, LogMeta } from "../../application/interfaces/Logger";

export interface WinstonLoggerOptions {
  level?: string;
  /** Diagnostics file; a date is inserted before `.log`. */
  file?: string;
  /** Extra transports, e.g. a silent or in-memory one in tests. */
  transports?: TransportStream[];
}

export class WinstonLogger implements Logger {
  private readonly logger: winston.Logger;

  constructor(options: WinstonLoggerOptions = {}) {
    const transports: TransportStream[] = options.transports ? [...options.transports] : [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            let line = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(meta).length > 0) {
              line += ` ${JSON.stringify(meta)}`;
            }
            return line;
          })
        ),
      }),
    ];

    if (options.file) {
      transports.push(
        new DailyRotateFile({
          filename: options.file.replace(/\.log$/, "") + "-%DATE%.log",
          datePattern: "YYYY-MM-DD",
          maxSize: "20m",
          maxFiles: "7d",
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? "info",
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { component: "log-shipper" },
      transports,
    });
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public setLevel(level: string): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}
