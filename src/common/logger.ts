// logger.ts - Centralized logging utility for the health monitor
import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  minLevel?: LogLevel;
  // When set, lines are also appended to <logDir>/<component>.log
  logDir?: string;
  maxFileSize?: number;
  maxFiles?: number;
}

export function parseLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
  }
}

export class Logger {
  private logFile: string | null = null;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number;
  private maxFiles: number;

  constructor(component: string, options: LoggerOptions = {}) {
    this.component = component;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
    this.maxFiles = options.maxFiles ?? 5;

    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      this.logFile = path.join(options.logDir, `${component}.log`);
      this.rotateLogsIfNeeded();
    }
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) {
      return;
    }

    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  public formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${message}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(data, null, 2)}`;
    }

    if (error !== undefined) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${errorMessage}`;
      // Stack traces only for ERROR and above
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${error.stack}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (level >= LogLevel.WARN) {
      console.error(logMessage.trim());
    } else {
      console.log(logMessage.trim());
    }

    if (!this.logFile) {
      return;
    }

    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  // Convenience methods for common patterns
  public startOperation(operation: string, context?: unknown): void {
    this.info(`Starting: ${operation}`, context);
  }

  public endOperation(operation: string, success: boolean, result?: unknown): void {
    if (success) {
      this.info(`Completed: ${operation}`, result);
    } else {
      this.error(`Failed: ${operation}`, result);
    }
  }

  public logSkipped(what: string, error: unknown): void {
    this.debug(`Skipped ${what}`, { reason: error instanceof Error ? error.message : String(error) });
  }
}

// The subset of Logger the collectors and the pipeline call into
export type LogWriter = Pick<Logger, 'debug' | 'info' | 'warn' | 'error' | 'startOperation' | 'endOperation' | 'logSkipped'>;

export default Logger;
