import { Logger, LogLevel } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
  sessionId?: string;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logDirectory: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableConsole: boolean;
  sessionId?: string;
  component?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];
const LOG_FILE_PREFIX = 'file-organizer-';

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = value?.trim().toUpperCase();
  return LOG_LEVELS.find((level) => level === upper) ?? fallback;
}

function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

// Shared between a logger and its children so they append to one file
interface LogFileState {
  currentLogFile?: string;
  logFileSize: number;
}

/**
 * Leveled logger writing to the console and, optionally, to rotating JSON-lines files
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private readonly fileState: LogFileState;

  constructor(config: Partial<LoggerConfig> = {}, fileState?: LogFileState) {
    this.config = {
      level: 'INFO',
      enableFileLogging: false,
      logDirectory: './logs',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      enableConsole: true,
      ...config
    };

    this.fileState = fileState ?? { logFileSize: 0 };

    if (this.config.enableFileLogging && !this.fileState.currentLogFile) {
      this.initializeFileLogging();
    }
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!isLevelEnabled(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      sessionId: this.config.sessionId,
      component: this.config.component
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.config.enableFileLogging) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const prefix = `[${entry.level}] ${entry.timestamp}`;
    const suffix = entry.component ? ` [${entry.component}]` : '';
    const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';

    const fullMessage = `${prefix}${suffix} ${entry.message}${metaStr}`;

    switch (entry.level) {
      case 'ERROR':
        console.error(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'INFO':
        console.info(fullMessage);
        break;
      case 'DEBUG':
        console.debug(fullMessage);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    if (!this.fileState.currentLogFile) {
      return;
    }

    const logLine = JSON.stringify(entry) + '\n';

    try {
      fs.appendFileSync(this.fileState.currentLogFile, logLine);
      this.fileState.logFileSize += Buffer.byteLength(logLine);

      if (this.fileState.logFileSize > this.config.maxFileSize) {
        this.rotateLogFile();
      }
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private initializeFileLogging(): void {
    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
      this.openNewLogFile();
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      this.config.enableFileLogging = false;
    }
  }

  private openNewLogFile(): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.fileState.currentLogFile = path.join(this.config.logDirectory, `${LOG_FILE_PREFIX}${timestamp}.log`);
    fs.writeFileSync(this.fileState.currentLogFile, '');
    this.fileState.logFileSize = 0;
  }

  private rotateLogFile(): void {
    try {
      this.cleanupOldLogFiles();
      this.openNewLogFile();
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  private cleanupOldLogFiles(): void {
    try {
      const files = fs.readdirSync(this.config.logDirectory)
        .filter(file => file.startsWith(LOG_FILE_PREFIX) && file.endsWith('.log'))
        .map(file => ({
          path: path.join(this.config.logDirectory, file),
          mtime: fs.statSync(path.join(this.config.logDirectory, file)).mtime
        }))
        .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

      // Keep only the most recent files, leaving room for the one about to be opened
      for (const file of files.slice(Math.max(0, this.config.maxFiles - 1))) {
        fs.unlinkSync(file.path);
      }
    } catch (error) {
      console.error('Failed to cleanup old log files:', error);
    }
  }

  public getLogFilePath(): string | undefined {
    return this.fileState.currentLogFile;
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  public createChildLogger(component: string): EnhancedLogger {
    return new EnhancedLogger({ ...this.config, component }, this.fileState);
  }
}

/**
 * Plain console logger, mostly used to keep test output quiet
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (isLevelEnabled(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, formatMeta(meta));
    }
  }

  warn(message: string, meta?: unknown): void {
    if (isLevelEnabled(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, formatMeta(meta));
    }
  }

  info(message: string, meta?: unknown): void {
    if (isLevelEnabled(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, formatMeta(meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    if (isLevelEnabled(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, formatMeta(meta));
    }
  }
}

function formatMeta(meta: unknown): string {
  return meta !== undefined ? JSON.stringify(meta, null, 2) : '';
}

// Default logger instance
export const logger = new EnhancedLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  sessionId: process.env.SESSION_ID,
  enableFileLogging: false
});
