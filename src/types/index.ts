// Core interfaces and types shared across the organizer

export * from './utils';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// Progress tracking types
export interface ProgressInfo {
  fraction: number;
  current: number;
  total: number;
  file: string;
  group?: string;
}

export type ProgressCallback = (progress: ProgressInfo) => void;

export type CancellationCheck = () => boolean;

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
