// Path and permission validation gating every directory and file touchpoint

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { Logger } from '../../types';
import { isErrnoException, errorMessage } from '../../types/utils';
import { ValidationError } from '../../core/errors';
import { LIMITS, UNIX_SYSTEM_PREFIXES } from '../../core/constants';
import { SafetyReport } from '../../core/organizer-types';
import { DirectoryManager } from '../local/directory-manager';
import { PathUtils } from '../local/path-utils';

export interface PathValidatorOptions {
  platform?: NodeJS.Platform;
  // Windows system directory; Node cannot read the system attribute bit
  systemRoot?: string;
}

export interface ValidatedOperation {
  source: string;
  destination: string;
  destinationExists: boolean;
}

export interface OperationValidationOptions {
  // Plan only: do not create the destination directory, check its nearest existing ancestor instead
  dryRun?: boolean;
}

export class PathValidator {
  private readonly logger: Logger;
  private readonly directoryManager: DirectoryManager;
  private readonly platform: NodeJS.Platform;
  private readonly systemRoot?: string;

  constructor(directoryManager: DirectoryManager, logger: Logger, options: PathValidatorOptions = {}) {
    this.directoryManager = directoryManager;
    this.logger = logger;
    this.platform = options.platform ?? process.platform;
    this.systemRoot = options.systemRoot ?? process.env.SystemRoot;
  }

  /**
   * The directory must exist, be readable and be listable
   */
  async validateSourceDirectory(directoryPath: string): Promise<string> {
    const resolved = path.resolve(directoryPath);
    const stats = await this.statOrFail(resolved, `Source directory does not exist: ${resolved}`);

    if (!stats.isDirectory()) {
      throw new ValidationError(`Source path is not a directory: ${resolved}`, resolved);
    }

    if (!(await this.hasAccess(resolved, fsConstants.R_OK))) {
      throw new ValidationError(`No read permission for directory: ${resolved}`, resolved);
    }

    try {
      const dir = await fs.opendir(resolved);
      await dir.close();
    } catch (error) {
      throw new ValidationError(`Directory is not accessible: ${resolved} (${errorMessage(error)})`, resolved);
    }

    this.logger.debug(`Source directory validated: ${resolved}`);
    return resolved;
  }

  async validateDestinationDirectory(directoryPath: string, createIfMissing = true): Promise<string> {
    const resolved = path.resolve(directoryPath);

    if (!(await this.directoryManager.exists(resolved))) {
      if (!createIfMissing) {
        throw new ValidationError(`Destination directory does not exist: ${resolved}`, resolved);
      }
      const created = await this.directoryManager.ensureDirectory(resolved);
      if (!created.success) {
        throw new ValidationError(`Cannot create destination directory: ${created.error ?? resolved}`, resolved);
      }
      this.logger.debug(`Created destination directory: ${resolved}`);
    }

    const stats = await this.statOrFail(resolved, `Destination directory does not exist: ${resolved}`);
    if (!stats.isDirectory()) {
      throw new ValidationError(`Destination path is not a directory: ${resolved}`, resolved);
    }

    if (!(await this.hasAccess(resolved, fsConstants.W_OK))) {
      throw new ValidationError(`No write permission for directory: ${resolved}`, resolved);
    }

    this.logger.debug(`Destination directory validated: ${resolved}`);
    return resolved;
  }

  /**
   * The file must exist, be a regular readable file and be openable.
   * Failing to open it is treated as the file being locked.
   */
  async validateFilePath(filePath: string): Promise<string> {
    const resolved = path.resolve(filePath);
    const stats = await this.statOrFail(resolved, `File does not exist: ${resolved}`);

    if (!stats.isFile()) {
      throw new ValidationError(`Path is not a file: ${resolved}`, resolved);
    }

    if (!(await this.hasAccess(resolved, fsConstants.R_OK))) {
      throw new ValidationError(`No read permission for file: ${resolved}`, resolved);
    }

    if (!(await this.isOpenable(resolved))) {
      throw new ValidationError(`File may be in use or locked: ${resolved}`, resolved);
    }

    return resolved;
  }

  async validateMoveOperation(
    source: string,
    destination: string,
    options: OperationValidationOptions = {}
  ): Promise<ValidatedOperation> {
    const validated = await this.validateOperationPaths(source, destination, options);

    const sourceDirectory = path.dirname(validated.source);
    if (!(await this.hasAccess(sourceDirectory, fsConstants.W_OK))) {
      throw new ValidationError(`No permission to move file from: ${sourceDirectory}`, validated.source);
    }

    return validated;
  }

  async validateCopyOperation(
    source: string,
    destination: string,
    options: OperationValidationOptions = {}
  ): Promise<ValidatedOperation> {
    const validated = await this.validateOperationPaths(source, destination, options);

    if (!(await this.hasFreeSpaceFor(validated.source, path.dirname(validated.destination)))) {
      throw new ValidationError('Insufficient disk space for copy operation', validated.source, {
        destination: validated.destination,
      });
    }

    return validated;
  }

  /**
   * Visit every file beneath the directory once (hidden ones included) and report what may get in the way
   */
  async scanDirectorySafety(directoryPath: string): Promise<SafetyReport> {
    const resolved = await this.validateSourceDirectory(directoryPath);
    const report: SafetyReport = {
      directory: resolved,
      totalFiles: 0,
      accessibleFiles: 0,
      lockedFiles: 0,
      hiddenFiles: 0,
      systemFiles: 0,
      largeFiles: [],
      warnings: [],
      suppressedWarnings: 0,
    };

    const addWarning = (warning: string): void => {
      if (report.warnings.length < LIMITS.MAX_SAFETY_WARNINGS) {
        report.warnings.push(warning);
      } else {
        report.suppressedWarnings++;
      }
    };

    const scan = await this.directoryManager.scanFiles(resolved, { includeHidden: true });
    for (const directory of scan.unreadableDirectories) {
      addWarning(`Unreadable directory: ${directory}`);
    }

    for (const file of scan.files) {
      report.totalFiles++;

      if (await this.isOpenable(file.path)) {
        report.accessibleFiles++;
      } else {
        report.lockedFiles++;
        addWarning(`Locked file: ${file.path}`);
      }

      if (PathUtils.isHidden(path.basename(file.path))) {
        report.hiddenFiles++;
      }

      if (this.isSystemPath(file.path)) {
        report.systemFiles++;
        addWarning(`System file: ${file.path}`);
      }

      try {
        const { size } = await fs.stat(file.path);
        if (size > LIMITS.LARGE_FILE_BYTES) {
          report.largeFiles.push({ path: file.path, sizeMb: Math.round((size / (1024 * 1024)) * 100) / 100 });
        }
      } catch (error) {
        addWarning(`Cannot read size of ${file.path}: ${errorMessage(error)}`);
      }
    }

    this.logger.debug(`Safety scan of ${resolved}`, {
      totalFiles: report.totalFiles,
      lockedFiles: report.lockedFiles,
      systemFiles: report.systemFiles,
    });

    return report;
  }

  /**
   * Safe when fewer than 10% of files are locked or system files; an empty directory is safe.
   * A directory that fails validation is never safe.
   */
  async isSafeToOrganize(directoryPath: string): Promise<boolean> {
    let report: SafetyReport;
    try {
      report = await this.scanDirectorySafety(directoryPath);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Not safe to organize: ${error.message}`);
        return false;
      }
      throw error;
    }
    return PathValidator.isSafeReport(report);
  }

  static isSafeReport(report: SafetyReport): boolean {
    if (report.totalFiles === 0) {
      return true;
    }
    return (report.lockedFiles + report.systemFiles) / report.totalFiles < LIMITS.MAX_UNSAFE_RATIO;
  }

  isSystemPath(filePath: string): boolean {
    const resolved = path.resolve(filePath);

    if (this.platform === 'win32') {
      if (!this.systemRoot) {
        return false;
      }
      const root = this.systemRoot.toLowerCase().replace(/[\\/]+$/, '');
      const candidate = resolved.toLowerCase();
      return candidate === root || candidate.startsWith(`${root}\\`) || candidate.startsWith(`${root}/`);
    }

    return UNIX_SYSTEM_PREFIXES.some((prefix) => resolved === prefix || resolved.startsWith(`${prefix}/`));
  }

  private async validateOperationPaths(
    source: string,
    destination: string,
    options: OperationValidationOptions
  ): Promise<ValidatedOperation> {
    const validatedSource = await this.validateFilePath(source);
    const resolvedDestination = path.resolve(destination);
    const destinationDirectory = path.dirname(resolvedDestination);

    if (options.dryRun) {
      await this.validatePlannedDirectory(destinationDirectory);
    } else {
      await this.validateDestinationDirectory(destinationDirectory);
    }

    const destinationExists = await this.directoryManager.exists(resolvedDestination);
    if (destinationExists) {
      this.logger.warn(`Destination file already exists: ${resolvedDestination}`);
    }

    return { source: validatedSource, destination: resolvedDestination, destinationExists };
  }

  /**
   * Dry-run counterpart of validateDestinationDirectory: nothing is created,
   * the nearest existing ancestor must be a writable directory
   */
  async validatePlannedDirectory(directoryPath: string): Promise<string> {
    const resolved = path.resolve(directoryPath);
    let current = resolved;
    while (!(await this.directoryManager.exists(current))) {
      const parent = path.dirname(current);
      if (parent === current) {
        throw new ValidationError(`No existing ancestor for destination: ${resolved}`, resolved);
      }
      current = parent;
    }

    const stats = await fs.stat(current);
    if (!stats.isDirectory()) {
      throw new ValidationError(`Destination path is not a directory: ${current}`, resolved);
    }
    if (!(await this.hasAccess(current, fsConstants.W_OK))) {
      throw new ValidationError(`No write permission for directory: ${current}`, resolved);
    }
    return resolved;
  }

  private async hasFreeSpaceFor(sourceFile: string, destinationDirectory: string): Promise<boolean> {
    try {
      const { size } = await fs.stat(sourceFile);
      const stats = await fs.statfs(destinationDirectory);
      return stats.bavail * stats.bsize >= size * LIMITS.FREE_SPACE_MARGIN;
    } catch (error) {
      // Free space is advisory; platforms that cannot report it pass
      this.logger.debug(`Free space check unavailable for ${destinationDirectory}: ${errorMessage(error)}`);
      return true;
    }
  }

  private async statOrFail(target: string, missingMessage: string) {
    try {
      return await fs.stat(target);
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        throw new ValidationError(missingMessage, target);
      }
      throw new ValidationError(`Cannot access ${target}: ${errorMessage(error)}`, target);
    }
  }

  private async hasAccess(target: string, mode: number): Promise<boolean> {
    try {
      await fs.access(target, mode);
      return true;
    } catch {
      return false;
    }
  }

  private async isOpenable(filePath: string): Promise<boolean> {
    try {
      const handle = await fs.open(filePath, 'r');
      await handle.close();
      return true;
    } catch {
      return false;
    }
  }
}
