import { config } from "../config";

export enum LogLevel {
  SILENT = -1,
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogMeta = Record<string, unknown>;

/**
 * Minimal view of an HTTP exchange for request logging, so the logger does
 * not depend on express types.
 */
export interface LoggedRequest {
  method: string;
  url: string;
  ip?: string;
  subjectId?: string;
}

class Logger {
  private level: LogLevel;
  private readonly jsonFormat: boolean;

  constructor(level: string, jsonFormat: boolean) {
    this.level = this.parseLogLevel(level);
    this.jsonFormat = jsonFormat;
  }

  private parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case "silent":
        return LogLevel.SILENT;
      case "error":
        return LogLevel.ERROR;
      case "warn":
        return LogLevel.WARN;
      case "info":
        return LogLevel.INFO;
      case "debug":
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  private formatMessage(level: string, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    if (this.jsonFormat) {
      return JSON.stringify({ timestamp, level, message, ...meta });
    }
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level}: ${message}${metaStr}`;
  }

  error(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.INFO)) {
      console.info(this.formatMessage("INFO", message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.debug(this.formatMessage("DEBUG", message, meta));
    }
  }

  // Specialized logging methods
  logRequest(
    req: LoggedRequest,
    statusCode: number,
    responseTime: number,
  ): void {
    this.info("Request completed", {
      method: req.method,
      url: req.url,
      statusCode,
      responseTime: `${responseTime}ms`,
      ip: req.ip,
      subjectId: req.subjectId,
    });
  }

  logError(error: Error, req?: LoggedRequest): void {
    const context = req
      ? {
          method: req.method,
          url: req.url,
          ip: req.ip,
          subjectId: req.subjectId,
        }
      : {};

    this.error("Error occurred", {
      error: error.message,
      name: error.name,
      stack: error.stack,
      ...context,
    });
  }

  logDecision(
    subjectId: string,
    resource: string,
    action: string,
    scope: string,
    details?: LogMeta,
  ): void {
    this.debug("Authorization decision", {
      subjectId,
      resource,
      action,
      scope,
      ...details,
    });
  }
}

export const logger = new Logger(config.logLevel, config.jsonLogFormat);
