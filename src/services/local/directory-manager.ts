// Local directory manager for destination folders and source tree scanning

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../../types';
import { isErrnoException } from '../../types/utils';
import { DirectoryCreateResult, ScanResult, ScannedFile } from './types';
import { PathUtils } from './path-utils';

export interface ScanOptions {
  includeHidden?: boolean;
}

/**
 * Creates group folders and enumerates files beneath a root
 */
export class DirectoryManager {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Create a directory if it does not exist yet. `created` is true only when this call made it.
   */
  async ensureDirectory(directoryPath: string, dryRun = false): Promise<DirectoryCreateResult> {
    try {
      if (!PathUtils.isValidPath(directoryPath)) {
        return {
          success: false,
          error: `Invalid directory path: ${directoryPath}`
        };
      }

      const existing = await statOrNull(directoryPath);
      if (existing) {
        if (!existing.isDirectory()) {
          return {
            success: false,
            error: `Path exists but is not a directory: ${directoryPath}`
          };
        }
        return { success: true, directoryPath, created: false };
      }

      if (dryRun) {
        this.logger.debug(`[dry run] Would create directory: ${directoryPath}`);
        return { success: true, directoryPath, created: false };
      }

      await fs.mkdir(directoryPath, { recursive: true });
      this.logger.debug(`Created directory: ${directoryPath}`);

      return { success: true, directoryPath, created: true };
    } catch (error) {
      const errorMessage = `Failed to create directory ${directoryPath}: ${describeFsError(error)}`;
      this.logger.error(errorMessage);

      return {
        success: false,
        error: errorMessage
      };
    }
  }

  async exists(targetPath: string): Promise<boolean> {
    return (await statOrNull(targetPath)) !== null;
  }

  /**
   * Recursively list regular files beneath root in name order.
   * Dot-prefixed files and directories are skipped unless includeHidden is set.
   * Symbolic links are not followed.
   */
  async scanFiles(root: string, options: ScanOptions = {}): Promise<ScanResult> {
    const resolvedRoot = path.resolve(root);
    const result: ScanResult = {
      root: resolvedRoot,
      files: [],
      skippedHidden: 0,
      unreadableDirectories: []
    };

    await this.walk(resolvedRoot, resolvedRoot, options.includeHidden ?? false, result);

    this.logger.debug(`Scanned ${resolvedRoot}: ${result.files.length} files`, {
      skippedHidden: result.skippedHidden,
      unreadableDirectories: result.unreadableDirectories.length
    });

    return result;
  }

  private async walk(root: string, directory: string, includeHidden: boolean, result: ScanResult): Promise<void> {
    let entries;
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (directory === root) {
        throw error;
      }
      this.logger.warn(`Cannot read directory ${directory}: ${describeFsError(error)}`);
      result.unreadableDirectories.push(directory);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (!includeHidden && PathUtils.isHidden(entry.name)) {
        result.skippedHidden++;
        continue;
      }

      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.walk(root, entryPath, includeHidden, result);
      } else if (entry.isFile()) {
        const file: ScannedFile = { path: entryPath, relativePath: path.relative(root, entryPath) };
        result.files.push(file);
      }
    }
  }
}

async function statOrNull(targetPath: string) {
  try {
    return await fs.stat(targetPath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * False only for a missing path; other stat failures propagate
 */
export async function pathExists(targetPath: string): Promise<boolean> {
  return (await statOrNull(targetPath)) !== null;
}

export function describeFsError(error: unknown): string {
  if (isErrnoException(error)) {
    switch (error.code) {
      case 'EACCES':
      case 'EPERM':
        return `Permission denied (${error.message})`;
      case 'ENOSPC':
        return `Insufficient disk space (${error.message})`;
      case 'EROFS':
        return `Read-only filesystem (${error.message})`;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
