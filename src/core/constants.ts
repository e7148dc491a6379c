// Core constants and configuration defaults

export const DEFAULT_ORGANIZER_CONFIG = {
  mode: 'type' as const,
  conflictStrategy: 'rename' as const,
  dateSource: 'auto' as const,
  dateFormat: 'YYYY-MM-DD' as const,
  createSubdirs: true,
  dryRun: false,
  handleUnknownDates: true,
  backupDirectory: './backup',
  auditDirectory: './audit',
  enableAuditFile: false,
  logLevel: 'INFO' as const,
};

export const UNCATEGORIZED = 'Uncategorized';
export const UNKNOWN_DATE_FOLDER = 'Unknown-Date';

// Group name used for run-level failures that are not tied to one file
export const OPERATION_ERROR_FILE = 'OPERATION';

export const LIMITS = {
  MAX_RENAME_ATTEMPTS: 9999,
  HASH_CHUNK_SIZE: 64 * 1024,
  MAGIC_BYTES_LENGTH: 16,
  LARGE_FILE_BYTES: 100 * 1024 * 1024, // 100MB
  FREE_SPACE_MARGIN: 1.1,
  MAX_UNSAFE_RATIO: 0.1,
  MAX_SAFETY_WARNINGS: 50,
};

export const CATEGORY_CONFIG_FILES = {
  DEFAULTS: 'default_categories.json',
  CUSTOM: 'custom_categories.json',
} as const;

export const UNIX_SYSTEM_PREFIXES = Object.freeze(['/bin', '/sbin', '/usr/bin', '/usr/sbin', '/etc']);

export const EXIF_EXTENSIONS = Object.freeze(['.jpg', '.jpeg', '.tiff', '.tif', '.raw', '.cr2', '.nef', '.arw']);
