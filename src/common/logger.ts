// logger.ts - Centralized logging utility for the health monitor
import * as fs from 'fs';
import * as path from 'path';
import { sanitizeLogData } from '../security';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

/**
 * The slice of the logger that pipeline components depend on.
 * Tests hand in plain objects of `jest.fn()`s.
 */
export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown, error?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  maxFileSize?: number;
  maxFiles?: number;
  console?: boolean;
}

export class Logger implements ComponentLogger {
  private logDir: string;
  private logFile: string;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;
  private writeToConsole: boolean;
  private sessionLines: string[] = [];

  constructor(component: string, logDir: string, options: LoggerOptions = {}) {
    this.component = component;
    this.logDir = logDir;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.maxFileSize = options.maxFileSize ?? this.maxFileSize;
    this.maxFiles = options.maxFiles ?? this.maxFiles;
    this.writeToConsole = options.console ?? true;

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logFile = path.join(logDir, `${component}.log`);
    this.rotateLogsIfNeeded();
  }

  private rotateLogsIfNeeded(): void {
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

  private formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    const sanitizedMessage = String(sanitizeLogData(message));
    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${sanitizedMessage}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(sanitizeLogData(data), null, 2)}`;
    }

    if (error !== undefined) {
      const rawMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${String(sanitizeLogData(rawMessage))}`;
      // Stack traces only for ERROR and above
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${String(sanitizeLogData(error.stack))}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);
    this.sessionLines.push(logMessage.trim());

    if (this.writeToConsole) {
      if (level >= LogLevel.WARN) {
        console.error(logMessage.trim());
      } else {
        console.log(logMessage.trim());
      }
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

  public critical(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.CRITICAL, message, data, error);
  }

  public startOperation(operation: string, context?: unknown): void {
    this.info(`Starting: ${operation}`, context);
  }

  public endOperation(operation: string, success: boolean, result?: unknown): void {
    if (success) {
      this.info(`Completed: ${operation}`, result);
    } else {
      this.error(`Failed: ${operation}`, undefined, result);
    }
  }

  /**
   * Everything this logger has written since it was created, oldest first.
   * The health run ships this as the record's debug log.
   */
  public getSessionLog(): string {
    return this.sessionLines.join('\n');
  }

  public getLogFile(): string {
    return this.logFile;
  }
}

export default Logger;
