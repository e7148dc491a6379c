// Metadata about a source/destination pair that collide

import * as fs from 'fs/promises';
import { createReadStream } from 'fs';
import { createHash } from 'crypto';
import { LIMITS } from '../../core/constants';
import { isErrnoException } from '../../types/utils';

interface FileFacts {
  exists: boolean;
  size: number;
  modified?: Date;
}

async function readFacts(filePath: string): Promise<FileFacts> {
  try {
    const stats = await fs.stat(filePath);
    return { exists: true, size: stats.size, modified: stats.mtime };
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return { exists: false, size: 0 };
    }
    throw error;
  }
}

/**
 * Streamed SHA-256 of a file's contents, read in fixed-size chunks
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath, { highWaterMark: LIMITS.HASH_CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export class ConflictInfo {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly sourceExists: boolean;
  readonly destinationExists: boolean;
  readonly sourceSize: number;
  readonly destinationSize: number;
  readonly sourceModified?: Date;
  readonly destinationModified?: Date;

  // Hashes are computed at most once and only when asked for
  private sourceHash?: Promise<string>;
  private destinationHash?: Promise<string>;

  private constructor(sourcePath: string, destinationPath: string, source: FileFacts, destination: FileFacts) {
    this.sourcePath = sourcePath;
    this.destinationPath = destinationPath;
    this.sourceExists = source.exists;
    this.destinationExists = destination.exists;
    this.sourceSize = source.size;
    this.destinationSize = destination.size;
    this.sourceModified = source.modified;
    this.destinationModified = destination.modified;
  }

  static async create(sourcePath: string, destinationPath: string): Promise<ConflictInfo> {
    const [source, destination] = await Promise.all([readFacts(sourcePath), readFacts(destinationPath)]);
    return new ConflictInfo(sourcePath, destinationPath, source, destination);
  }

  getSourceHash(): Promise<string> {
    this.sourceHash ??= hashFile(this.sourcePath);
    return this.sourceHash;
  }

  getDestinationHash(): Promise<string> {
    this.destinationHash ??= hashFile(this.destinationPath);
    return this.destinationHash;
  }

  /**
   * Sizes first, content only when the sizes agree
   */
  async areIdentical(): Promise<boolean> {
    if (!this.sourceExists || !this.destinationExists) {
      return false;
    }
    if (this.sourceSize !== this.destinationSize) {
      return false;
    }
    const [sourceHash, destinationHash] = await Promise.all([this.getSourceHash(), this.getDestinationHash()]);
    return sourceHash === destinationHash;
  }

  /**
   * -1 when the source is older, 1 when newer, 0 when equal, undefined when either time is unknown
   */
  compareModified(): -1 | 0 | 1 | undefined {
    if (!this.sourceModified || !this.destinationModified) {
      return undefined;
    }
    const delta = this.sourceModified.getTime() - this.destinationModified.getTime();
    return delta === 0 ? 0 : delta > 0 ? 1 : -1;
  }
}
