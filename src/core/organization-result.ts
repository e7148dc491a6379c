// Mutable tally for one organize run, frozen into an OrganizationReport at the end

import { v4 as uuidv4 } from 'uuid';
import { FileFailure, GroupSummary, OrganizationReport } from './organizer-types';

export interface OrganizationResultInit {
  operation: string;
  sourceDirectory: string;
  destinationDirectory: string;
  dryRun: boolean;
  sessionId?: string;
  now?: () => Date;
}

export class OrganizationResult {
  readonly sessionId: string;
  readonly operation: string;
  readonly sourceDirectory: string;
  readonly destinationDirectory: string;
  readonly dryRun: boolean;

  totalFiles = 0;
  processedFiles = 0;
  foldersCreated = 0;
  conflictsResolved = 0;
  totalBytes = 0;
  cancelled = false;

  private readonly groups = new Map<string, GroupSummary>();
  private readonly errors: FileFailure[] = [];
  private readonly skipped: FileFailure[] = [];
  private readonly now: () => Date;
  private readonly startedAt: Date;

  constructor(init: OrganizationResultInit) {
    this.sessionId = init.sessionId ?? uuidv4();
    this.operation = init.operation;
    this.sourceDirectory = init.sourceDirectory;
    this.destinationDirectory = init.destinationDirectory;
    this.dryRun = init.dryRun;
    this.now = init.now ?? (() => new Date());
    this.startedAt = this.now();
  }

  get skippedFiles(): number {
    return this.skipped.length;
  }

  get errorFiles(): number {
    return this.errors.length;
  }

  recordProcessed(group: string, size: number): void {
    this.processedFiles++;
    this.totalBytes += size;
    const summary = this.groups.get(group) ?? { count: 0, totalBytes: 0 };
    summary.count++;
    summary.totalBytes += size;
    this.groups.set(group, summary);
  }

  recordSkipped(file: string, reason: string): void {
    this.skipped.push({ file, message: reason });
  }

  recordError(file: string, message: string): void {
    this.errors.push({ file, message });
  }

  /**
   * Percentage of scanned files that were processed, one decimal
   */
  get successRate(): number {
    if (this.totalFiles === 0) {
      return 0;
    }
    return Math.round((this.processedFiles / this.totalFiles) * 1000) / 10;
  }

  toReport(): OrganizationReport {
    const finishedAt = this.now();
    const groups: Record<string, GroupSummary> = {};
    for (const [name, summary] of this.groups) {
      groups[name] = Object.freeze({ ...summary });
    }

    return Object.freeze({
      sessionId: this.sessionId,
      operation: this.operation,
      sourceDirectory: this.sourceDirectory,
      destinationDirectory: this.destinationDirectory,
      totalFiles: this.totalFiles,
      processedFiles: this.processedFiles,
      skippedFiles: this.skippedFiles,
      errorFiles: this.errorFiles,
      foldersCreated: this.foldersCreated,
      conflictsResolved: this.conflictsResolved,
      totalBytes: this.totalBytes,
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      successRate: this.successRate,
      dryRun: this.dryRun,
      cancelled: this.cancelled,
      groups: Object.freeze(groups),
      errors: this.errors.map((failure) => Object.freeze({ ...failure })),
      skipped: this.skipped.map((failure) => Object.freeze({ ...failure })),
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    });
  }
}
