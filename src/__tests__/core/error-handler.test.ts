import { ErrorHandler, ErrorCategory, ErrorSeverity, RecoveryStrategy } from '../../core/error-handler';
import {
  ConfigurationError,
  ConflictUnresolvableError,
  OperationError,
  ValidationError,
} from '../../core/errors';
import { ConsoleLogger } from '../../core/logger';

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

describe('ErrorHandler', () => {
  let errorHandler: ErrorHandler;

  beforeEach(() => {
    errorHandler = new ErrorHandler(new ConsoleLogger('ERROR'), 3);
  });

  describe('Error Categorization', () => {
    it('should categorize validation errors as skippable', () => {
      const error = new ValidationError('File may be in use or locked: /data/a.txt', '/data/a.txt');

      const categorized = errorHandler.handleError(error, {
        operation: 'organize_file',
        filePath: '/data/a.txt',
        timestamp: new Date(),
      });

      expect(categorized.category).toBe(ErrorCategory.VALIDATION);
      expect(categorized.severity).toBe(ErrorSeverity.LOW);
      expect(categorized.recoveryStrategy).toBe(RecoveryStrategy.SKIP);
      expect(categorized.message).toBe('File may be in use or locked: /data/a.txt');
      expect(categorized.userMessage).toBe('File failed validation during organize file for "/data/a.txt". Skipping this file.');
    });

    it('should categorize unresolvable conflicts', () => {
      const error = new ConflictUnresolvableError('File skipped due to conflict', '/src/a.txt', '/dest/a.txt');

      const categorized = errorHandler.handleError(error, { operation: 'resolve_conflict', timestamp: new Date() });

      expect(categorized.category).toBe(ErrorCategory.CONFLICT);
      expect(categorized.userMessage).toBe('Destination conflict during resolve conflict. The file was left in place.');
    });

    it('should categorize configuration errors as fatal', () => {
      const categorized = errorHandler.handleError(new ConfigurationError('Invalid date format'), {
        operation: 'organize',
        timestamp: new Date(),
      });

      expect(categorized.category).toBe(ErrorCategory.CONFIGURATION);
      expect(categorized.severity).toBe(ErrorSeverity.HIGH);
      expect(categorized.recoveryStrategy).toBe(RecoveryStrategy.ABORT);
    });

    it('should categorize operation errors by their errno', () => {
      const permission = new OperationError('move', '/data/a.txt', errnoError('EACCES', 'permission denied'));
      const space = new OperationError('copy', '/data/b.txt', errnoError('ENOSPC', 'no space left on device'));
      const other = new OperationError('move', '/data/c.txt', errnoError('EBUSY', 'resource busy'));

      expect(errorHandler.handleError(permission, { operation: 'move', timestamp: new Date() }).category).toBe(
        ErrorCategory.PERMISSION
      );

      const spaceError = errorHandler.handleError(space, { operation: 'copy', timestamp: new Date() });
      expect(spaceError.category).toBe(ErrorCategory.DISK_SPACE);
      expect(spaceError.severity).toBe(ErrorSeverity.CRITICAL);
      expect(spaceError.recoveryStrategy).toBe(RecoveryStrategy.MANUAL);

      expect(errorHandler.handleError(other, { operation: 'move', timestamp: new Date() }).category).toBe(
        ErrorCategory.FILE_SYSTEM
      );
    });

    it('should categorize raw system errors by code', () => {
      const categorized = errorHandler.handleError(errnoError('ENOENT', 'no such file or directory'), {
        operation: 'move',
        filePath: '/data/gone.txt',
        timestamp: new Date(),
      });

      expect(categorized.category).toBe(ErrorCategory.NOT_FOUND);
      expect(categorized.userMessage).toBe('File disappeared during move for "/data/gone.txt".');
    });

    it('should fall back to the message for plain errors', () => {
      const context = { operation: 'scan', timestamp: new Date() };

      expect(errorHandler.handleError(new Error('Access denied by policy'), context).category).toBe(
        ErrorCategory.PERMISSION
      );
      expect(errorHandler.handleError(new Error('something odd'), context).category).toBe(ErrorCategory.UNKNOWN);
    });

    it('should wrap non-error values', () => {
      const categorized = errorHandler.handleError('plain failure', { operation: 'scan', timestamp: new Date() });

      expect(categorized.originalError).toBeInstanceOf(Error);
      expect(categorized.message).toBe('plain failure');
    });
  });

  describe('Statistics', () => {
    it('should count errors by category, severity and recovery', () => {
      const context = { operation: 'organize_file', timestamp: new Date() };
      errorHandler.handleError(new ValidationError('locked', '/a'), context);
      errorHandler.handleError(new ConfigurationError('bad'), context);
      errorHandler.handleError(errnoError('EPERM', 'operation not permitted'), context);

      const stats = errorHandler.getStatistics();

      expect(stats.totalErrors).toBe(3);
      expect(stats.errorsByCategory[ErrorCategory.VALIDATION]).toBe(1);
      expect(stats.errorsByCategory[ErrorCategory.CONFIGURATION]).toBe(1);
      expect(stats.errorsByCategory[ErrorCategory.PERMISSION]).toBe(1);
      expect(stats.errorsBySeverity[ErrorSeverity.LOW]).toBe(1);
      expect(stats.errorsBySeverity[ErrorSeverity.MEDIUM]).toBe(1);
      expect(stats.errorsBySeverity[ErrorSeverity.HIGH]).toBe(1);
      expect(stats.skippedErrors).toBe(2);
      expect(stats.abortedOperations).toBe(1);
    });

    it('should bound the error history', () => {
      for (let i = 0; i < 5; i++) {
        errorHandler.handleError(new Error(`failure ${i}`), { operation: 'scan', timestamp: new Date() });
      }

      const recent = errorHandler.getRecentErrors(60000);

      expect(recent.map((error) => error.message)).toEqual(['failure 2', 'failure 3', 'failure 4']);
      expect(errorHandler.getStatistics().totalErrors).toBe(5);
    });

    it('should filter recent errors by time window', () => {
      errorHandler.handleError(new Error('old'), { operation: 'scan', timestamp: new Date(Date.now() - 120000) });
      errorHandler.handleError(new Error('new'), { operation: 'scan', timestamp: new Date() });

      expect(errorHandler.getRecentErrors(60000).map((error) => error.message)).toEqual(['new']);
    });

    it('should filter errors by category', () => {
      errorHandler.handleError(new ValidationError('locked', '/a'), { operation: 'scan', timestamp: new Date() });
      errorHandler.handleError(new Error('odd'), { operation: 'scan', timestamp: new Date() });

      expect(errorHandler.getErrorsByCategory(ErrorCategory.VALIDATION)).toHaveLength(1);
    });

    it('should clear history and statistics', () => {
      errorHandler.handleError(new Error('odd'), { operation: 'scan', timestamp: new Date() });

      errorHandler.clearHistory();

      expect(errorHandler.getStatistics().totalErrors).toBe(0);
      expect(errorHandler.getRecentErrors(60000)).toEqual([]);
    });
  });

  describe('Error Report', () => {
    it('should recommend fixes for the categories seen', () => {
      const context = { operation: 'move', timestamp: new Date() };
      errorHandler.handleError(errnoError('EACCES', 'permission denied'), context);
      errorHandler.handleError(errnoError('ENOSPC', 'no space left on device'), context);

      const report = errorHandler.generateErrorReport();

      expect(report.summary.totalErrors).toBe(2);
      expect(report.recentErrors).toHaveLength(2);
      expect(report.recommendations).toEqual([
        'Check that the source files and destination folders are writable',
        'Free up disk space at the destination before running again',
      ]);
    });

    it('should have no recommendations without errors', () => {
      expect(errorHandler.generateErrorReport().recommendations).toEqual([]);
    });
  });
});
