// Organizer-specific types and interfaces

import { CancellationCheck, LogLevel, ProgressCallback } from '../types';

export const ORGANIZE_MODES = ['type', 'date'] as const;
export type OrganizeMode = (typeof ORGANIZE_MODES)[number];

export const CONFLICT_STRATEGIES = [
  'skip',
  'rename',
  'overwrite',
  'backup',
  'size-compare',
  'date-compare',
  'hash-compare',
] as const;
export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

export const DATE_SOURCES = ['metadata', 'filename', 'creation', 'modification', 'access', 'auto'] as const;
export type DateSource = (typeof DATE_SOURCES)[number];

// The sources a file's date can actually come from; 'auto' only ever resolves to one of these
export type ResolvedDateSource = Exclude<DateSource, 'auto'>;

export const DATE_FORMATS = [
  'YYYY',
  'YYYY-MM',
  'YYYY-MM-DD',
  'YYYY-QQ',
  'YYYY-WW',
  'MM-YYYY',
  'MMM-YYYY',
  'YYYY-MMM',
  'YYYY-MMMM',
  'custom',
] as const;
export type DateFormat = (typeof DATE_FORMATS)[number];

export type ClassificationMethod = 'extension' | 'mime' | 'magic' | 'unknown' | 'error';

export interface ClassificationResult {
  category: string;
  method: ClassificationMethod;
}

export interface ClassificationStatistics {
  total: number;
  categorized: number;
  uncategorized: number;
  errors: number;
  byMethod: Record<ClassificationMethod, number>;
}

export interface CategoryStats {
  count: number;
  percentage: number;
  totalBytes: number;
  accessibleFiles: number;
  inaccessibleFiles: number;
}

export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface FileDateInfo {
  filePath: string;
  creation?: Date;
  modification?: Date;
  access?: Date;
  filename?: Date;
  metadata?: Date;
  bestDate: Date;
  bestSource: ResolvedDateSource | null;
}

export interface DateGroupingOptions {
  source: DateSource;
  format: DateFormat;
  range?: DateRange;
  customFormat?: string;
}

export interface DateGroupingStatistics {
  total: number;
  grouped: number;
  unknown: number;
  outOfRange: number;
  errors: Array<{ file: string; message: string }>;
  bySource: Partial<Record<ResolvedDateSource | 'unknown', number>>;
}

export interface DateDistribution {
  totalFiles: number;
  filesWithDate: number;
  filesWithoutDate: number;
  earliest?: Date;
  latest?: Date;
  bySource: Partial<Record<ResolvedDateSource, number>>;
  byYear: Record<string, number>;
  byMonth: Record<string, number>;
  problematicFiles: string[];
}

export interface LargeFileInfo {
  path: string;
  sizeMb: number;
}

export interface SafetyReport {
  directory: string;
  totalFiles: number;
  accessibleFiles: number;
  lockedFiles: number;
  hiddenFiles: number;
  systemFiles: number;
  largeFiles: LargeFileInfo[];
  warnings: string[];
  suppressedWarnings: number;
}

export type ConflictRecommendation = 'skip_identical' | 'overwrite_larger' | 'overwrite_newer' | 'rename_safe';

export interface ConflictDetail {
  sourcePath: string;
  destinationPath: string;
  sourceSize: number;
  destinationSize: number;
  identical: boolean;
  sourceNewer: boolean;
  recommendation: ConflictRecommendation;
}

export interface ConflictAnalysis {
  totalFiles: number;
  conflicts: number;
  identicalFiles: number;
  sizeDifferences: number;
  dateDifferences: number;
  details: ConflictDetail[];
}

export interface ConflictStats {
  totalConflicts: number;
  resolutionStrategies: Partial<Record<ConflictStrategy, number>>;
  backupDirectory: string;
}

export type FileOperationType = 'move' | 'copy';

export interface FileOperationResult {
  success: boolean;
  operation: FileOperationType;
  sourcePath: string;
  destinationPath?: string;
  size?: number;
  skipped?: boolean;
  conflictResolved?: boolean;
  dryRun: boolean;
  error?: string;
}

export interface BatchOperationRequest {
  type: string;
  source: string;
  destination: string;
}

export interface RollbackEntry {
  id: string;
  operation: 'move';
  from: string;
  to: string;
  timestamp: string;
}

export interface RollbackResult {
  restored: number;
  failed: Array<{ entry: RollbackEntry; message: string }>;
  dryRun: boolean;
}

export interface GroupSummary {
  count: number;
  totalBytes: number;
}

export interface FileFailure {
  file: string;
  message: string;
}

export interface OrganizationReport {
  sessionId: string;
  operation: string;
  sourceDirectory: string;
  destinationDirectory: string;
  totalFiles: number;
  processedFiles: number;
  skippedFiles: number;
  errorFiles: number;
  foldersCreated: number;
  conflictsResolved: number;
  totalBytes: number;
  durationMs: number;
  successRate: number;
  dryRun: boolean;
  cancelled: boolean;
  groups: Record<string, GroupSummary>;
  errors: FileFailure[];
  skipped: FileFailure[];
  startedAt: string;
  finishedAt: string;
}

export interface PreviewReport {
  sourceDirectory: string;
  mode: OrganizeMode;
  totalFiles: number;
  estimatedFolders: number;
  groups: Record<string, GroupSummary>;
  fileMapping: Array<{ file: string; group: string }>;
}

export interface OrganizeRunOptions {
  sourceDir: string;
  destinationDir?: string;
  dryRun?: boolean;
  onProgress?: ProgressCallback;
  shouldCancel?: CancellationCheck;
}

export interface OrganizeByTypeOptions extends OrganizeRunOptions {
  createSubdirs?: boolean;
}

export interface OrganizeByDateOptions extends OrganizeRunOptions {
  dateFormat?: DateFormat;
  dateSource?: DateSource;
  customFormat?: string;
  dateRange?: DateRange;
}

export interface OrganizerConfig {
  mode: OrganizeMode;
  conflictStrategy: ConflictStrategy;
  dateSource: DateSource;
  dateFormat: DateFormat;
  customDateFormat?: string;
  createSubdirs: boolean;
  dryRun: boolean;
  handleUnknownDates: boolean;
  backupDirectory: string;
  categoriesDirectory?: string;
  auditDirectory: string;
  enableAuditFile: boolean;
  logLevel: LogLevel;
}
