// Error categorization, statistics and reporting for organize operations

import { Logger } from '../types';
import { isErrnoException } from '../types/utils';
import {
  ConfigurationError,
  ConflictUnresolvableError,
  OperationError,
  OrganizerError,
  ValidationError,
} from './errors';

export enum ErrorCategory {
  VALIDATION = 'validation',
  CONFLICT = 'conflict',
  PERMISSION = 'permission',
  NOT_FOUND = 'not_found',
  DISK_SPACE = 'disk_space',
  FILE_SYSTEM = 'file_system',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum RecoveryStrategy {
  SKIP = 'skip',
  ABORT = 'abort',
  MANUAL = 'manual',
}

export interface ErrorContext {
  operation: string;
  filePath?: string;
  destinationPath?: string;
  group?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  recoveryStrategy: RecoveryStrategy;
  context: ErrorContext;
  message: string;
  userMessage: string;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
  skippedErrors: number;
  abortedOperations: number;
}

export interface ErrorReport {
  summary: ErrorStatistics;
  recentErrors: CategorizedError[];
  recommendations: string[];
}

function emptyCategoryCounts(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.VALIDATION]: 0,
    [ErrorCategory.CONFLICT]: 0,
    [ErrorCategory.PERMISSION]: 0,
    [ErrorCategory.NOT_FOUND]: 0,
    [ErrorCategory.DISK_SPACE]: 0,
    [ErrorCategory.FILE_SYSTEM]: 0,
    [ErrorCategory.CONFIGURATION]: 0,
    [ErrorCategory.UNKNOWN]: 0,
  };
}

function emptySeverityCounts(): Record<ErrorSeverity, number> {
  return {
    [ErrorSeverity.LOW]: 0,
    [ErrorSeverity.MEDIUM]: 0,
    [ErrorSeverity.HIGH]: 0,
    [ErrorSeverity.CRITICAL]: 0,
  };
}

/**
 * Categorizes per-file failures, keeps a bounded history and produces recommendations.
 * Never decides to stop a run on its own: the engine records and continues.
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private statistics: ErrorStatistics;
  private readonly errorHistory: CategorizedError[] = [];
  private readonly maxHistorySize: number;

  constructor(logger: Logger, maxHistorySize = 1000) {
    this.logger = logger;
    this.maxHistorySize = maxHistorySize;
    this.statistics = this.createStatistics();
  }

  /**
   * Categorize, record and log an error
   */
  handleError(error: unknown, context: ErrorContext): CategorizedError {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const categorizedError = this.categorizeError(originalError, context);

    this.updateStatistics(categorizedError);
    this.addToHistory(categorizedError);
    this.logError(categorizedError);

    return categorizedError;
  }

  getStatistics(): ErrorStatistics {
    return {
      ...this.statistics,
      errorsByCategory: { ...this.statistics.errorsByCategory },
      errorsBySeverity: { ...this.statistics.errorsBySeverity },
    };
  }

  getRecentErrors(timeWindowMs: number): CategorizedError[] {
    const cutoff = new Date(Date.now() - timeWindowMs);
    return this.errorHistory.filter((error) => error.context.timestamp >= cutoff);
  }

  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((error) => error.category === category);
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
    this.statistics = this.createStatistics();
  }

  generateErrorReport(): ErrorReport {
    return {
      summary: this.getStatistics(),
      recentErrors: this.getRecentErrors(3600000), // Last hour
      recommendations: this.generateRecommendations(),
    };
  }

  private categorizeError(error: Error, context: ErrorContext): CategorizedError {
    const { category, severity, recoveryStrategy } = this.classify(error);

    return {
      originalError: error,
      category,
      severity,
      recoveryStrategy,
      context,
      message: error.message,
      userMessage: this.generateUserMessage(category, context),
    };
  }

  private classify(error: Error): {
    category: ErrorCategory;
    severity: ErrorSeverity;
    recoveryStrategy: RecoveryStrategy;
  } {
    if (error instanceof ConflictUnresolvableError) {
      return { category: ErrorCategory.CONFLICT, severity: ErrorSeverity.LOW, recoveryStrategy: RecoveryStrategy.SKIP };
    }
    if (error instanceof ConfigurationError) {
      return {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.HIGH,
        recoveryStrategy: RecoveryStrategy.ABORT,
      };
    }

    const errno = error instanceof OperationError ? error.errno : isErrnoException(error) ? error.code : undefined;
    switch (errno) {
      case 'EACCES':
      case 'EPERM':
      case 'EROFS':
        return {
          category: ErrorCategory.PERMISSION,
          severity: ErrorSeverity.MEDIUM,
          recoveryStrategy: RecoveryStrategy.SKIP,
        };
      case 'ENOENT':
        return {
          category: ErrorCategory.NOT_FOUND,
          severity: ErrorSeverity.MEDIUM,
          recoveryStrategy: RecoveryStrategy.SKIP,
        };
      case 'ENOSPC':
      case 'EDQUOT':
        return {
          category: ErrorCategory.DISK_SPACE,
          severity: ErrorSeverity.CRITICAL,
          recoveryStrategy: RecoveryStrategy.MANUAL,
        };
    }

    if (error instanceof ValidationError) {
      return { category: ErrorCategory.VALIDATION, severity: ErrorSeverity.LOW, recoveryStrategy: RecoveryStrategy.SKIP };
    }
    if (error instanceof OrganizerError || errno !== undefined) {
      return {
        category: ErrorCategory.FILE_SYSTEM,
        severity: ErrorSeverity.HIGH,
        recoveryStrategy: RecoveryStrategy.SKIP,
      };
    }

    const errorMessage = error.message.toLowerCase();
    if (errorMessage.includes('permission') || errorMessage.includes('access denied')) {
      return {
        category: ErrorCategory.PERMISSION,
        severity: ErrorSeverity.MEDIUM,
        recoveryStrategy: RecoveryStrategy.SKIP,
      };
    }
    if (errorMessage.includes('no such file') || errorMessage.includes('not found')) {
      return {
        category: ErrorCategory.NOT_FOUND,
        severity: ErrorSeverity.MEDIUM,
        recoveryStrategy: RecoveryStrategy.SKIP,
      };
    }
    if (errorMessage.includes('disk space') || errorMessage.includes('no space')) {
      return {
        category: ErrorCategory.DISK_SPACE,
        severity: ErrorSeverity.CRITICAL,
        recoveryStrategy: RecoveryStrategy.MANUAL,
      };
    }

    return { category: ErrorCategory.UNKNOWN, severity: ErrorSeverity.MEDIUM, recoveryStrategy: RecoveryStrategy.SKIP };
  }

  private updateStatistics(error: CategorizedError): void {
    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[error.category]++;
    this.statistics.errorsBySeverity[error.severity]++;

    if (error.recoveryStrategy === RecoveryStrategy.SKIP) {
      this.statistics.skippedErrors++;
    } else if (error.recoveryStrategy === RecoveryStrategy.ABORT) {
      this.statistics.abortedOperations++;
    }
  }

  private addToHistory(error: CategorizedError): void {
    this.errorHistory.push(error);

    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }
  }

  private logError(error: CategorizedError): void {
    const logMessage = `${error.category.toUpperCase()} error in ${error.context.operation}`;
    const logMeta = {
      severity: error.severity,
      filePath: error.context.filePath,
      destinationPath: error.context.destinationPath,
      message: error.message,
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        this.logger.error(logMessage, logMeta);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(logMessage, logMeta);
        break;
      case ErrorSeverity.LOW:
        this.logger.debug(logMessage, logMeta);
        break;
    }
  }

  private generateUserMessage(category: ErrorCategory, context: ErrorContext): string {
    const operation = context.operation.replace(/_/g, ' ');
    const file = context.filePath ? ` for "${context.filePath}"` : '';

    switch (category) {
      case ErrorCategory.VALIDATION:
        return `File failed validation during ${operation}${file}. Skipping this file.`;
      case ErrorCategory.CONFLICT:
        return `Destination conflict during ${operation}${file}. The file was left in place.`;
      case ErrorCategory.PERMISSION:
        return `Permission denied during ${operation}${file}. Check file and folder permissions.`;
      case ErrorCategory.NOT_FOUND:
        return `File disappeared during ${operation}${file}.`;
      case ErrorCategory.DISK_SPACE:
        return `Not enough disk space during ${operation}${file}. Free up space and run again.`;
      case ErrorCategory.FILE_SYSTEM:
        return `File system error during ${operation}${file}.`;
      case ErrorCategory.CONFIGURATION:
        return `Configuration error. Please check your organizer settings.`;
      case ErrorCategory.UNKNOWN:
        return `Unexpected error during ${operation}${file}.`;
    }
  }

  private generateRecommendations(): string[] {
    const recommendations: string[] = [];
    const byCategory = this.statistics.errorsByCategory;

    if (byCategory[ErrorCategory.PERMISSION] > 0) {
      recommendations.push('Check that the source files and destination folders are writable');
    }

    if (byCategory[ErrorCategory.DISK_SPACE] > 0) {
      recommendations.push('Free up disk space at the destination before running again');
    }

    if (byCategory[ErrorCategory.NOT_FOUND] > 0) {
      recommendations.push('Avoid modifying the source directory while organizing');
    }

    if (byCategory[ErrorCategory.VALIDATION] > 5) {
      recommendations.push('Close applications that may be locking files in the source directory');
    }

    if (byCategory[ErrorCategory.CONFLICT] > 10) {
      recommendations.push('Consider the rename or hash-compare conflict strategy');
    }

    if (this.statistics.totalErrors > 50) {
      recommendations.push('Consider organizing smaller directories one at a time');
    }

    return recommendations;
  }

  private createStatistics(): ErrorStatistics {
    return {
      totalErrors: 0,
      errorsByCategory: emptyCategoryCounts(),
      errorsBySeverity: emptySeverityCounts(),
      skippedErrors: 0,
      abortedOperations: 0,
    };
  }
}
