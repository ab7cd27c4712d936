import {
  createLogger,
  format,
  transports,
  Logger as WinstonLogger,
} from "winston";

const { combine, printf, timestamp, colorize, json } = format;

export interface LogContext {
  tool?: string;
  query?: string;
  subreddit?: string;
  postId?: string;
  fetched?: number;
  flagged?: number;
  durationMs?: number;
  reason?: string;
  error?: string | Error;
  [key: string]: unknown;
}

function devFormat() {
  return printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    return `${timestamp} [${level}] ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`;
  });
}

function prodFormat() {
  return json();
}

export function prodDevLogger(): WinstonLogger {
  return createLogger({
    level: "info",
    format: combine(timestamp(), prodFormat()),
    transports: [
      new transports.File({
        level: "info",
        filename: "logs/radar-info.log",
      }),
      new transports.File({
        level: "error",
        filename: "logs/radar-error.log",
      }),
    ],
  });
}

export function buildDevLogger(silent = false): WinstonLogger {
  return createLogger({
    level: "debug",
    silent,
    format: combine(colorize(), timestamp(), devFormat()),
    transports: [new transports.Console()],
  });
}

// Context-aware wrapper
export class AppLogger {
  private logger: WinstonLogger;
  private serviceName: string;

  constructor(logger: WinstonLogger, serviceName: string) {
    this.logger = logger;
    this.serviceName = serviceName;
  }

  child(serviceName: string): AppLogger {
    return new AppLogger(this.logger, `${this.serviceName}:${serviceName}`);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  info(message: string, context?: LogContext): void {
    this.logger.info({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn({
      service: this.serviceName,
      message,
      ...this.errorField(context),
      ...this.prepareContext(context),
    });
  }

  error(message: string, context?: LogContext): void {
    this.logger.error({
      service: this.serviceName,
      message,
      ...this.errorField(context),
      ...this.prepareContext(context),
    });
  }

  private errorField(context?: LogContext): { error?: string } {
    const error = this.describeError(context?.error);
    return error === undefined ? {} : { error };
  }

  private describeError(error?: string | Error): string | undefined {
    return error instanceof Error ? error.stack : error;
  }

  private prepareContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};
    const { error, ...rest } = context; // prevent duplicate error field
    return rest;
  }
}
