// Strategy-based resolution of destination collisions

import * as path from 'path';
import { Logger } from '../../types';
import { LIMITS } from '../../core/constants';
import { ConflictUnresolvableError, FileOperation, OperationError, OrganizerError } from '../../core/errors';
import { ConflictAnalysis, ConflictDetail, ConflictStats, ConflictStrategy } from '../../core/organizer-types';
import { FileMover } from '../local/file-mover';
import { pathExists } from '../local/directory-manager';
import { PathUtils } from '../local/path-utils';
import { strftime } from '../dates/date-formatter';
import { ConflictInfo } from './conflict-info';

export interface ConflictResolverOptions {
  backupRoot?: string;
  defaultStrategy?: ConflictStrategy;
  now?: () => Date;
}

export interface ResolveOptions {
  dryRun?: boolean;
}

const BACKUP_STAMP = '%Y%m%d_%H%M%S';

/**
 * Decides where a file goes when its destination is taken.
 *
 * Returns the path to write to, or throws ConflictUnresolvableError when the
 * strategy decides the source must not be written. The caller performs the move.
 */
export class ConflictResolver {
  private readonly fileMover: FileMover;
  private readonly logger: Logger;
  private readonly defaultStrategy: ConflictStrategy;
  private readonly now: () => Date;
  private readonly backupDirectory: string;
  private totalConflicts = 0;
  private resolutionStrategies: Partial<Record<ConflictStrategy, number>> = {};

  constructor(fileMover: FileMover, logger: Logger, options: ConflictResolverOptions = {}) {
    this.fileMover = fileMover;
    this.logger = logger;
    this.defaultStrategy = options.defaultStrategy ?? 'rename';
    this.now = options.now ?? (() => new Date());
    // One backup folder per resolver, created on first use
    this.backupDirectory = path.resolve(options.backupRoot ?? 'backup', strftime(this.now(), BACKUP_STAMP));
  }

  async resolve(
    sourcePath: string,
    destinationPath: string,
    strategy: ConflictStrategy = this.defaultStrategy,
    options: ResolveOptions = {}
  ): Promise<string> {
    const dryRun = options.dryRun ?? false;
    const conflict = await ConflictInfo.create(sourcePath, destinationPath);

    if (!conflict.destinationExists) {
      return destinationPath;
    }

    this.totalConflicts++;
    this.resolutionStrategies[strategy] = (this.resolutionStrategies[strategy] ?? 0) + 1;
    this.logger.warn(`File conflict detected: ${destinationPath}`, { strategy });

    try {
      return await this.apply(strategy, conflict, dryRun);
    } catch (error) {
      if (error instanceof OrganizerError) {
        throw error;
      }
      throw new OperationError(operationFor(strategy), destinationPath, error);
    }
  }

  /**
   * A name not yet taken in the directory: the original, then `<stem>_N<ext>`,
   * then a timestamped name once the numbered attempts run out
   */
  async generateSafeFilename(fileName: string, directory: string): Promise<string> {
    if (!(await pathExists(path.join(directory, fileName)))) {
      return fileName;
    }

    for (let counter = 1; counter <= LIMITS.MAX_RENAME_ATTEMPTS; counter++) {
      const candidate = PathUtils.numberedFileName(fileName, counter);
      if (!(await pathExists(path.join(directory, candidate)))) {
        this.logger.debug(`Generated safe filename: ${candidate}`);
        return candidate;
      }
    }

    const now = this.now();
    const stamp = `${strftime(now, '%Y%m%d_%H%M%S')}_${String(now.getMilliseconds()).padStart(3, '0')}`;
    const fallback = PathUtils.timestampedFileName(fileName, stamp);
    this.logger.warn(`Using timestamp fallback: ${fallback}`);
    return fallback;
  }

  /**
   * Read-only look at which sources would collide inside destinationDirectory
   */
  async analyzeConflicts(sourcePaths: readonly string[], destinationDirectory: string): Promise<ConflictAnalysis> {
    const analysis: ConflictAnalysis = {
      totalFiles: sourcePaths.length,
      conflicts: 0,
      identicalFiles: 0,
      sizeDifferences: 0,
      dateDifferences: 0,
      details: [],
    };

    for (const sourcePath of sourcePaths) {
      const destinationPath = path.join(destinationDirectory, path.basename(sourcePath));
      const conflict = await ConflictInfo.create(sourcePath, destinationPath);
      if (!conflict.destinationExists) {
        continue;
      }

      analysis.conflicts++;
      const identical = await conflict.areIdentical();
      const sourceNewer = conflict.compareModified() === 1;
      const detail: ConflictDetail = {
        sourcePath,
        destinationPath,
        sourceSize: conflict.sourceSize,
        destinationSize: conflict.destinationSize,
        identical,
        sourceNewer,
        recommendation: 'rename_safe',
      };

      if (identical) {
        analysis.identicalFiles++;
        detail.recommendation = 'skip_identical';
      } else if (conflict.sourceSize > conflict.destinationSize) {
        analysis.sizeDifferences++;
        detail.recommendation = 'overwrite_larger';
      } else if (sourceNewer) {
        analysis.dateDifferences++;
        detail.recommendation = 'overwrite_newer';
      }

      analysis.details.push(detail);
    }

    return analysis;
  }

  getConflictStats(): ConflictStats {
    return {
      totalConflicts: this.totalConflicts,
      resolutionStrategies: { ...this.resolutionStrategies },
      backupDirectory: this.backupDirectory,
    };
  }

  getBackupDirectory(): string {
    return this.backupDirectory;
  }

  resetStats(): void {
    this.totalConflicts = 0;
    this.resolutionStrategies = {};
  }

  private async apply(strategy: ConflictStrategy, conflict: ConflictInfo, dryRun: boolean): Promise<string> {
    switch (strategy) {
      case 'skip':
        return this.skip(conflict);
      case 'rename':
        return this.rename(conflict);
      case 'overwrite':
        return this.overwrite(conflict, dryRun);
      case 'backup':
        return this.backup(conflict, dryRun);
      case 'size-compare':
        return this.sizeCompare(conflict, dryRun);
      case 'date-compare':
        return this.dateCompare(conflict, dryRun);
      case 'hash-compare':
        return this.hashCompare(conflict);
      default: {
        const unknownStrategy: never = strategy;
        throw new ConflictUnresolvableError(
          `Unknown conflict strategy: ${String(unknownStrategy)}`,
          conflict.sourcePath,
          conflict.destinationPath
        );
      }
    }
  }

  private skip(conflict: ConflictInfo): never {
    this.logger.info(`Skipping conflicting file: ${path.basename(conflict.sourcePath)}`);
    throw this.unresolvable('File skipped due to conflict', conflict);
  }

  private async rename(conflict: ConflictInfo): Promise<string> {
    const directory = path.dirname(conflict.destinationPath);
    const fileName = path.basename(conflict.destinationPath);

    for (let counter = 1; counter <= LIMITS.MAX_RENAME_ATTEMPTS; counter++) {
      const candidate = path.join(directory, PathUtils.numberedFileName(fileName, counter));
      if (!(await pathExists(candidate))) {
        this.logger.info(`Renamed to avoid conflict: ${path.basename(candidate)}`);
        return candidate;
      }
    }

    throw this.unresolvable('Cannot generate unique filename - too many conflicts', conflict);
  }

  private async overwrite(conflict: ConflictInfo, dryRun: boolean): Promise<string> {
    if (dryRun) {
      this.logger.info(`[dry run] Would overwrite: ${path.basename(conflict.destinationPath)}`);
    } else {
      await this.fileMover.remove(conflict.destinationPath);
      this.logger.info(`Overwriting existing file: ${path.basename(conflict.destinationPath)}`);
    }
    return conflict.destinationPath;
  }

  private async backup(conflict: ConflictInfo, dryRun: boolean): Promise<string> {
    const fileName = path.basename(conflict.destinationPath);
    if (dryRun) {
      this.logger.info(`[dry run] Would back up and overwrite: ${fileName}`);
      return conflict.destinationPath;
    }

    const stamped = PathUtils.timestampedFileName(fileName, strftime(this.now(), BACKUP_STAMP));
    const backupName = await this.generateSafeFilename(stamped, this.backupDirectory);
    const backupPath = path.join(this.backupDirectory, backupName);

    try {
      await this.fileMover.copy(conflict.destinationPath, backupPath);
      await this.fileMover.remove(conflict.destinationPath);
    } catch (error) {
      throw new OperationError('backup', conflict.destinationPath, error);
    }

    this.logger.info(`Created backup: ${backupPath}`);
    return conflict.destinationPath;
  }

  private async sizeCompare(conflict: ConflictInfo, dryRun: boolean): Promise<string> {
    if (conflict.sourceSize > conflict.destinationSize) {
      this.logger.info(`Keeping larger file (source): ${conflict.sourceSize} > ${conflict.destinationSize} bytes`);
      return this.overwrite(conflict, dryRun);
    }
    if (conflict.sourceSize < conflict.destinationSize) {
      throw this.unresolvable('Destination file is larger - keeping existing', conflict);
    }
    this.logger.info('Files are the same size, comparing content');
    return this.hashCompare(conflict);
  }

  private async dateCompare(conflict: ConflictInfo, dryRun: boolean): Promise<string> {
    const comparison = conflict.compareModified();
    if (comparison === undefined) {
      this.logger.warn('Cannot compare file dates, falling back to rename');
      return this.rename(conflict);
    }
    if (comparison > 0) {
      this.logger.info('Keeping newer file (source)');
      return this.overwrite(conflict, dryRun);
    }
    if (comparison < 0) {
      throw this.unresolvable('Destination file is newer - keeping existing', conflict);
    }
    this.logger.info('Files have the same modification time, comparing content');
    return this.hashCompare(conflict);
  }

  private async hashCompare(conflict: ConflictInfo): Promise<string> {
    if (await conflict.areIdentical()) {
      throw this.unresolvable('Files are identical - skipping duplicate', conflict);
    }
    this.logger.info('Files differ, keeping both with rename');
    return this.rename(conflict);
  }

  private unresolvable(reason: string, conflict: ConflictInfo): ConflictUnresolvableError {
    return new ConflictUnresolvableError(reason, conflict.sourcePath, conflict.destinationPath);
  }
}

function operationFor(strategy: ConflictStrategy): FileOperation {
  switch (strategy) {
    case 'backup':
      return 'backup';
    case 'overwrite':
    case 'size-compare':
    case 'date-compare':
      return 'delete';
    default:
      return 'move';
  }
}
