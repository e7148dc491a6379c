// In-memory journal of committed moves, used for caller-initiated undo

import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../../types';
import { errorMessage } from '../../types/utils';
import { RollbackEntry, RollbackResult } from '../../core/organizer-types';
import { FileMover } from './file-mover';
import { pathExists } from './directory-manager';

export class RollbackJournal {
  private readonly entries: RollbackEntry[] = [];
  private readonly logger: Logger;
  private readonly fileMover: FileMover;

  constructor(fileMover: FileMover, logger: Logger) {
    this.fileMover = fileMover;
    this.logger = logger;
  }

  record(from: string, to: string): RollbackEntry {
    const entry: RollbackEntry = {
      id: uuidv4(),
      operation: 'move',
      from,
      to,
      timestamp: new Date().toISOString()
    };
    this.entries.push(entry);
    return entry;
  }

  getEntries(): RollbackEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
  }

  /**
   * Best-effort undo, newest first: each moved file goes back to where it came from.
   * Entries that could not be reversed stay in the journal.
   */
  async rollback(dryRun = false): Promise<RollbackResult> {
    const result: RollbackResult = { restored: 0, failed: [], dryRun };
    const remaining: RollbackEntry[] = [];

    for (const entry of [...this.entries].reverse()) {
      try {
        if (dryRun) {
          this.logger.info(`[dry run] Would undo ${entry.operation}: ${entry.to} -> ${entry.from}`);
        } else {
          if (await pathExists(entry.from)) {
            throw new Error(`Original location is occupied: ${entry.from}`);
          }
          await this.fileMover.move(entry.to, entry.from);
        }
        result.restored++;
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`Rollback failed for ${entry.to}: ${message}`);
        result.failed.push({ entry, message });
        remaining.unshift(entry);
      }
    }

    if (!dryRun) {
      this.entries.length = 0;
      this.entries.push(...remaining);
    }

    this.logger.info(`Rollback ${dryRun ? 'preview' : 'completed'}: ${result.restored} restored, ${result.failed.length} failed`);
    return result;
  }
}
