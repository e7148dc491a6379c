// Move and copy primitives for organizing files on local storage

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../../types';
import { isErrnoException } from '../../types/utils';
import { OperationError } from '../../core/errors';
import { TransferResult } from './types';

/**
 * Performs the actual filesystem mutation for a single file.
 * Destinations are expected to be resolved (conflicts handled) by the caller.
 */
export class FileMover {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Move a file, falling back to copy + unlink when source and destination sit on different devices
   */
  async move(sourcePath: string, destinationPath: string): Promise<TransferResult> {
    const size = await this.sizeOf(sourcePath, 'move');

    try {
      await fs.mkdir(path.dirname(destinationPath), { recursive: true });
      await fs.rename(sourcePath, destinationPath);
      this.logger.debug(`Moved ${sourcePath} -> ${destinationPath}`);
      return { sourcePath, destinationPath, size, crossDevice: false };
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'EXDEV')) {
        throw new OperationError('move', sourcePath, error);
      }
    }

    // Cross-device: copy then remove the original
    await this.copyPreservingTimes(sourcePath, destinationPath, 'move');
    try {
      await fs.unlink(sourcePath);
    } catch (error) {
      throw new OperationError('move', sourcePath, error);
    }

    this.logger.debug(`Moved across devices ${sourcePath} -> ${destinationPath}`);
    return { sourcePath, destinationPath, size, crossDevice: true };
  }

  async copy(sourcePath: string, destinationPath: string): Promise<TransferResult> {
    const size = await this.sizeOf(sourcePath, 'copy');
    await this.copyPreservingTimes(sourcePath, destinationPath, 'copy');
    this.logger.debug(`Copied ${sourcePath} -> ${destinationPath}`);
    return { sourcePath, destinationPath, size, crossDevice: false };
  }

  async remove(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.debug(`Removed ${filePath}`);
    } catch (error) {
      throw new OperationError('delete', filePath, error);
    }
  }

  private async copyPreservingTimes(
    sourcePath: string,
    destinationPath: string,
    operation: 'move' | 'copy'
  ): Promise<void> {
    try {
      await fs.mkdir(path.dirname(destinationPath), { recursive: true });
      await fs.copyFile(sourcePath, destinationPath);
      const stats = await fs.stat(sourcePath);
      await fs.utimes(destinationPath, stats.atime, stats.mtime);
    } catch (error) {
      throw new OperationError(operation, sourcePath, error);
    }
  }

  private async sizeOf(filePath: string, operation: 'move' | 'copy'): Promise<number> {
    try {
      return (await fs.stat(filePath)).size;
    } catch (error) {
      throw new OperationError(operation, filePath, error);
    }
  }
}
