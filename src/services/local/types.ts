// Local file management types and interfaces

export interface DirectoryCreateResult {
  success: boolean;
  directoryPath?: string;
  created?: boolean; // true if created, false if already existed
  error?: string;
}

export interface ScannedFile {
  path: string;
  relativePath: string;
}

export interface ScanResult {
  root: string;
  files: ScannedFile[];
  skippedHidden: number;
  unreadableDirectories: string[];
}

export interface TransferResult {
  sourcePath: string;
  destinationPath: string;
  size: number;
  crossDevice: boolean;
}

/**
 * Result of path/filename sanitization operation
 */
export interface PathSanitizationResult {
  /**
   * The sanitized filename or path component
   */
  sanitized: string;

  /**
   * Whether the sanitization process modified the original string
   */
  changed: boolean;

  /**
   * Unique unsafe characters that were found and replaced
   */
  originalUnsafeChars?: string[];
}
