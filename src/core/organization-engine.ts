// Organization engine coordinating validation, grouping, conflict handling and file moves

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, ProgressCallback, CancellationCheck } from '../types';
import { Result, errorMessage, isOneOf } from '../types/utils';
import { ErrorHandler } from './error-handler';
import { ConfigurationError, ConflictUnresolvableError } from './errors';
import { OPERATION_ERROR_FILE, UNCATEGORIZED } from './constants';
import { OrganizationResult } from './organization-result';
import {
  BatchOperationRequest,
  DateDistribution,
  DateGroupingOptions,
  FileOperationResult,
  FileOperationType,
  OrganizationReport,
  OrganizeByDateOptions,
  OrganizeByTypeOptions,
  OrganizeMode,
  OrganizeRunOptions,
  OrganizerConfig,
  GroupSummary,
  PreviewReport,
  RollbackEntry,
  RollbackResult,
} from './organizer-types';
import { PathValidator } from '../services/validation/path-validator';
import { DirectoryManager } from '../services/local/directory-manager';
import { FileMover } from '../services/local/file-mover';
import { RollbackJournal } from '../services/local/rollback-journal';
import { PathUtils } from '../services/local/path-utils';
import { CategoryClassifier } from '../services/classification/category-classifier';
import { DateExtractor } from '../services/dates/date-extractor';
import { ConflictResolver } from '../services/conflicts/conflict-resolver';
import { AuditLogger } from '../progress/audit-logger';

const FILE_OPERATION_TYPES: readonly FileOperationType[] = ['move', 'copy'];

export interface OrganizationEngineDependencies {
  logger: Logger;
  config: OrganizerConfig;
  validator: PathValidator;
  directoryManager: DirectoryManager;
  classifier: CategoryClassifier;
  dateExtractor: DateExtractor;
  conflictResolver: ConflictResolver;
  fileMover: FileMover;
  rollbackJournal: RollbackJournal;
  auditLogger: AuditLogger;
  errorHandler?: ErrorHandler;
}

export interface FileOperationOptions {
  dryRun?: boolean;
}

export interface BatchOptions {
  dryRun?: boolean;
  onProgress?: ProgressCallback;
  shouldCancel?: CancellationCheck;
}

interface RunPlan {
  operation: string;
  options: OrganizeRunOptions;
  createSubdirs: boolean;
  group: (files: string[]) => Promise<Map<string, string[]>>;
}

/**
 * Runs organize passes over a directory tree, one file at a time.
 *
 * Directory-level validation failures end the run with a single OPERATION error;
 * everything that goes wrong for an individual file is recorded and the run continues.
 */
export class OrganizationEngine {
  private readonly logger: Logger;
  private readonly config: OrganizerConfig;
  private readonly validator: PathValidator;
  private readonly directoryManager: DirectoryManager;
  private readonly classifier: CategoryClassifier;
  private readonly dateExtractor: DateExtractor;
  private readonly conflictResolver: ConflictResolver;
  private readonly fileMover: FileMover;
  private readonly rollbackJournal: RollbackJournal;
  private readonly auditLogger: AuditLogger;
  private readonly errorHandler: ErrorHandler;

  private isOrganizing = false;

  constructor(dependencies: OrganizationEngineDependencies) {
    this.logger = dependencies.logger;
    this.config = dependencies.config;
    this.validator = dependencies.validator;
    this.directoryManager = dependencies.directoryManager;
    this.classifier = dependencies.classifier;
    this.dateExtractor = dependencies.dateExtractor;
    this.conflictResolver = dependencies.conflictResolver;
    this.fileMover = dependencies.fileMover;
    this.rollbackJournal = dependencies.rollbackJournal;
    this.auditLogger = dependencies.auditLogger;
    this.errorHandler = dependencies.errorHandler ?? new ErrorHandler(dependencies.logger);
  }

  async organizeByType(options: OrganizeByTypeOptions): Promise<OrganizationReport> {
    return this.run({
      operation: 'organize_by_type',
      options,
      createSubdirs: options.createSubdirs ?? this.config.createSubdirs,
      group: (files) => this.classifier.classifyAll(files),
    });
  }

  async organizeByDate(options: OrganizeByDateOptions): Promise<OrganizationReport> {
    const grouping = this.dateGroupingOptions(options);
    return this.run({
      operation: 'organize_by_date',
      options,
      createSubdirs: true,
      group: (files) => this.dateExtractor.organizeByDate(files, grouping),
    });
  }

  async moveFile(sourcePath: string, destinationPath: string, options: FileOperationOptions = {}): Promise<FileOperationResult> {
    return this.transfer('move', sourcePath, destinationPath, options.dryRun ?? this.config.dryRun);
  }

  async copyFile(sourcePath: string, destinationPath: string, options: FileOperationOptions = {}): Promise<FileOperationResult> {
    return this.transfer('copy', sourcePath, destinationPath, options.dryRun ?? this.config.dryRun);
  }

  /**
   * Execute explicit move/copy requests in order. An unknown type fails only that item.
   */
  async batchOperation(
    operations: readonly BatchOperationRequest[],
    options: BatchOptions = {}
  ): Promise<OrganizationReport> {
    const dryRun = options.dryRun ?? this.config.dryRun;
    const result = new OrganizationResult({
      operation: 'batch',
      sourceDirectory: '',
      destinationDirectory: '',
      dryRun,
    });
    result.totalFiles = operations.length;
    this.auditLogger.logSession('batch', 'started', { dryRun, totalFiles: operations.length });

    for (const [index, request] of operations.entries()) {
      if (options.shouldCancel?.()) {
        result.cancelled = true;
        this.logger.warn(`Batch cancelled after ${index} of ${operations.length} operations`);
        break;
      }

      if (!isOneOf(FILE_OPERATION_TYPES, request.type)) {
        result.recordError(request.source, `Unknown operation type: ${request.type}`);
      } else {
        const outcome = await this.transfer(request.type, request.source, request.destination, dryRun);
        if (outcome.success) {
          result.recordProcessed(request.type, outcome.size ?? 0);
          if (outcome.conflictResolved) {
            result.conflictsResolved++;
          }
        } else if (outcome.skipped) {
          result.recordSkipped(request.source, outcome.error ?? 'Skipped');
        } else {
          result.recordError(request.source, outcome.error ?? 'Operation failed');
        }
      }

      options.onProgress?.({
        fraction: (index + 1) / operations.length,
        current: index + 1,
        total: operations.length,
        file: request.source,
        group: request.type,
      });
    }

    return this.finish(result);
  }

  /**
   * What an organize run would do, computed from stat and read calls only
   */
  async getOrganizationPreview(
    sourceDir: string,
    mode: OrganizeMode = this.config.mode,
    dateOptions: Omit<OrganizeByDateOptions, 'sourceDir'> = {}
  ): Promise<Result<PreviewReport, string>> {
    try {
      const source = await this.validator.validateSourceDirectory(sourceDir);
      const files = (await this.directoryManager.scanFiles(source)).files.map((file) => file.path);
      const groups = mode === 'type'
        ? await this.classifier.classifyAll(files)
        : await this.dateExtractor.organizeByDate(files, this.dateGroupingOptions({ sourceDir, ...dateOptions }));

      const summaries: Record<string, GroupSummary> = {};
      const fileMapping: PreviewReport['fileMapping'] = [];
      for (const [group, members] of groups) {
        const summary: GroupSummary = { count: 0, totalBytes: 0 };
        for (const file of members) {
          summary.count++;
          summary.totalBytes += await this.sizeOrZero(file);
          fileMapping.push({ file, group });
        }
        summaries[group] = summary;
      }

      return {
        success: true,
        data: {
          sourceDirectory: source,
          mode,
          totalFiles: files.length,
          estimatedFolders: groups.size,
          groups: summaries,
          fileMapping,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Preview failed for ${sourceDir}: ${message}`);
      return { success: false, error: message };
    }
  }

  async analyzeDateDistribution(sourceDir: string): Promise<DateDistribution> {
    const source = await this.validator.validateSourceDirectory(sourceDir);
    const files = (await this.directoryManager.scanFiles(source)).files.map((file) => file.path);
    return this.dateExtractor.analyzeDateDistribution(files);
  }

  getRollbackLog(): RollbackEntry[] {
    return this.rollbackJournal.getEntries();
  }

  async rollback(options: FileOperationOptions = {}): Promise<RollbackResult> {
    const dryRun = options.dryRun ?? false;
    this.auditLogger.logRollback('started', { dryRun });
    const result = await this.rollbackJournal.rollback(dryRun);
    this.auditLogger.logRollback(result.failed.length > 0 ? 'failed' : 'completed', {
      dryRun,
      restored: result.restored,
      failed: result.failed.length,
    });
    return result;
  }

  clearRollbackLog(): void {
    this.rollbackJournal.clear();
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  getAuditLogger(): AuditLogger {
    return this.auditLogger;
  }

  isRunning(): boolean {
    return this.isOrganizing;
  }

  private async run(plan: RunPlan): Promise<OrganizationReport> {
    if (this.isOrganizing) {
      throw new Error('An organization run is already in progress');
    }
    this.isOrganizing = true;

    const { options, operation } = plan;
    const dryRun = options.dryRun ?? this.config.dryRun;
    const result = new OrganizationResult({
      operation,
      sourceDirectory: path.resolve(options.sourceDir),
      destinationDirectory: path.resolve(options.destinationDir ?? options.sourceDir),
      dryRun,
    });

    this.logger.info(`Starting ${operation}${dryRun ? ' (dry run)' : ''}`, {
      sessionId: result.sessionId,
      source: result.sourceDirectory,
      destination: result.destinationDirectory,
    });
    this.auditLogger.logSession(operation, 'started', {
      sourceDirectory: result.sourceDirectory,
      destinationDirectory: result.destinationDirectory,
      dryRun,
    });

    try {
      let files: string[];
      let groups: Map<string, string[]>;
      let destination: string;
      try {
        const source = await this.validator.validateSourceDirectory(options.sourceDir);
        destination = dryRun
          ? await this.validator.validatePlannedDirectory(result.destinationDirectory)
          : await this.validator.validateDestinationDirectory(result.destinationDirectory);
        this.auditLogger.logValidation(source, 'directories', 'completed');

        files = (await this.directoryManager.scanFiles(source)).files.map((file) => file.path);
        result.totalFiles = files.length;
        groups = await plan.group(files);
      } catch (error) {
        const handled = this.errorHandler.handleError(error, {
          operation,
          filePath: options.sourceDir,
          destinationPath: options.destinationDir,
          timestamp: new Date(),
        });
        result.recordError(OPERATION_ERROR_FILE, handled.message);
        this.auditLogger.logValidation(result.sourceDirectory, 'directories', 'failed', error);
        return this.finish(result);
      }

      await this.processGroups(plan, groups, files, destination, dryRun, result);
      return this.finish(result);
    } finally {
      this.isOrganizing = false;
    }
  }

  private async processGroups(
    plan: RunPlan,
    groups: Map<string, string[]>,
    files: readonly string[],
    destination: string,
    dryRun: boolean,
    result: OrganizationResult
  ): Promise<void> {
    const { onProgress, shouldCancel } = plan.options;
    const total = files.length;
    let current = 0;
    const report = (file: string, group?: string): void => {
      current++;
      onProgress?.({ fraction: total === 0 ? 1 : current / total, current, total, file, group });
    };

    // Files the grouping step left out (date range, unknown dates)
    const grouped = new Set<string>();
    for (const members of groups.values()) {
      members.forEach((file) => grouped.add(file));
    }
    for (const file of files) {
      if (!grouped.has(file)) {
        result.recordSkipped(file, 'Not assigned to any group');
        report(file);
      }
    }

    for (const [group, members] of groups) {
      if (!plan.createSubdirs && group === UNCATEGORIZED) {
        for (const file of members) {
          result.recordSkipped(file, 'Uncategorized files stay in place without subdirectories');
          report(file, group);
        }
        continue;
      }

      const groupDirectory = plan.createSubdirs
        ? path.join(destination, PathUtils.sanitizeRelativeFolderPath(group))
        : destination;

      const folder = await this.directoryManager.ensureDirectory(groupDirectory, dryRun);
      if (!folder.success) {
        const message = folder.error ?? `Cannot create folder ${groupDirectory}`;
        this.auditLogger.logFolderCreation(groupDirectory, 'failed', dryRun, message);
        for (const file of members) {
          result.recordError(file, message);
          report(file, group);
        }
        continue;
      }
      if (folder.created) {
        result.foldersCreated++;
        this.auditLogger.logFolderCreation(groupDirectory, 'completed', dryRun);
      }

      for (const file of members) {
        if (shouldCancel?.()) {
          result.cancelled = true;
          this.logger.warn(`Organization cancelled after ${current} of ${total} files`);
          return;
        }
        await this.organizeFile(file, group, groupDirectory, dryRun, result, plan.operation);
        report(file, group);
      }
    }
  }

  private async organizeFile(
    file: string,
    group: string,
    groupDirectory: string,
    dryRun: boolean,
    result: OrganizationResult,
    operation: string
  ): Promise<void> {
    const target = path.join(groupDirectory, path.basename(file));
    if (path.resolve(file) === target) {
      result.recordSkipped(file, 'Already organized');
      return;
    }

    try {
      const validated = await this.validator.validateMoveOperation(file, target, { dryRun });
      let finalDestination = validated.destination;
      if (validated.destinationExists) {
        finalDestination = await this.resolveConflict(validated.source, validated.destination, dryRun);
        result.conflictsResolved++;
      }

      const size = (await fs.stat(validated.source)).size;
      if (!dryRun) {
        await this.fileMover.move(validated.source, finalDestination);
        this.rollbackJournal.record(validated.source, finalDestination);
      }

      result.recordProcessed(group, size);
      this.auditLogger.logFileTransfer('move', validated.source, finalDestination, 'completed', { dryRun, size, group });
    } catch (error) {
      if (error instanceof ConflictUnresolvableError) {
        result.recordSkipped(file, error.reason);
        this.auditLogger.logFileTransfer('move', file, target, 'skipped', { dryRun, group, reason: error.reason });
        return;
      }

      const handled = this.errorHandler.handleError(error, {
        operation,
        filePath: file,
        destinationPath: target,
        group,
        timestamp: new Date(),
      });
      result.recordError(file, handled.message);
      this.auditLogger.logFileTransfer('move', file, target, 'failed', { dryRun, group, error });
    }
  }

  private async transfer(
    operation: FileOperationType,
    sourcePath: string,
    destinationPath: string,
    dryRun: boolean
  ): Promise<FileOperationResult> {
    try {
      const validated = operation === 'move'
        ? await this.validator.validateMoveOperation(sourcePath, destinationPath, { dryRun })
        : await this.validator.validateCopyOperation(sourcePath, destinationPath, { dryRun });

      let finalDestination = validated.destination;
      if (validated.destinationExists) {
        finalDestination = await this.resolveConflict(validated.source, validated.destination, dryRun);
      }

      const size = (await fs.stat(validated.source)).size;
      if (dryRun) {
        this.logger.info(`[dry run] Would ${operation}: ${validated.source} -> ${finalDestination}`);
      } else if (operation === 'move') {
        await this.fileMover.move(validated.source, finalDestination);
        this.rollbackJournal.record(validated.source, finalDestination);
      } else {
        await this.fileMover.copy(validated.source, finalDestination);
      }

      this.auditLogger.logFileTransfer(operation, validated.source, finalDestination, 'completed', { dryRun, size });
      return {
        success: true,
        operation,
        sourcePath: validated.source,
        destinationPath: finalDestination,
        size,
        conflictResolved: validated.destinationExists,
        dryRun,
      };
    } catch (error) {
      if (error instanceof ConflictUnresolvableError) {
        this.auditLogger.logFileTransfer(operation, sourcePath, destinationPath, 'skipped', { dryRun, reason: error.reason });
        return { success: false, operation, sourcePath, destinationPath, skipped: true, dryRun, error: error.reason };
      }

      const handled = this.errorHandler.handleError(error, {
        operation,
        filePath: sourcePath,
        destinationPath,
        timestamp: new Date(),
      });
      this.auditLogger.logFileTransfer(operation, sourcePath, destinationPath, 'failed', { dryRun, error });
      return { success: false, operation, sourcePath, destinationPath, dryRun, error: handled.message };
    }
  }

  private async resolveConflict(source: string, destination: string, dryRun: boolean): Promise<string> {
    const strategy = this.config.conflictStrategy;
    try {
      const resolved = await this.conflictResolver.resolve(source, destination, strategy, { dryRun });
      this.auditLogger.logConflictResolution(source, destination, strategy, 'completed', { resolvedPath: resolved, dryRun });
      return resolved;
    } catch (error) {
      if (error instanceof ConflictUnresolvableError) {
        this.auditLogger.logConflictResolution(source, destination, strategy, 'skipped', { reason: error.reason, dryRun });
      }
      throw error;
    }
  }

  private dateGroupingOptions(options: OrganizeByDateOptions): DateGroupingOptions {
    const format = options.dateFormat ?? this.config.dateFormat;
    const customFormat = options.customFormat ?? this.config.customDateFormat;
    if (format === 'custom' && !customFormat?.trim()) {
      throw new ConfigurationError('Custom date format requires a pattern', { format });
    }
    return {
      source: options.dateSource ?? this.config.dateSource,
      format,
      customFormat,
      range: options.dateRange,
    };
  }

  private finish(result: OrganizationResult): OrganizationReport {
    const report = result.toReport();
    this.auditLogger.logSession(report.operation, report.errorFiles > 0 && report.processedFiles === 0 ? 'failed' : 'completed', {
      sourceDirectory: report.sourceDirectory,
      destinationDirectory: report.destinationDirectory,
      dryRun: report.dryRun,
      totalFiles: report.totalFiles,
      processedFiles: report.processedFiles,
      skippedFiles: report.skippedFiles,
      errorFiles: report.errorFiles,
      duration: report.durationMs,
    });
    this.logger.info(
      `${report.operation} finished: ${report.processedFiles}/${report.totalFiles} processed, ` +
        `${report.skippedFiles} skipped, ${report.errorFiles} errors`,
      { sessionId: report.sessionId, dryRun: report.dryRun, cancelled: report.cancelled }
    );
    return report;
  }

  private async sizeOrZero(filePath: string): Promise<number> {
    try {
      return (await fs.stat(filePath)).size;
    } catch (error) {
      this.logger.debug(`Cannot stat ${filePath}: ${errorMessage(error)}`);
      return 0;
    }
  }
}
