// Error taxonomy for organizer operations

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT_UNRESOLVABLE: 'CONFLICT_UNRESOLVABLE',
  OPERATION_FAILED: 'OPERATION_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for every error raised by the organizer.
 * Carries a stable code and the paths/values involved.
 */
export class OrganizerError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;
  readonly timestamp: string;

  constructor(message: string, code: ErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

/**
 * A path failed a precondition: missing, wrong kind, unreadable, unwritable or locked.
 */
export class ValidationError extends OrganizerError {
  readonly path: string;

  constructor(message: string, path: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.VALIDATION_ERROR, { path, ...context });
    this.path = path;
  }
}

/**
 * The chosen conflict strategy decided the file must not be written.
 * Never fatal: the engine records the file as skipped.
 */
export class ConflictUnresolvableError extends OrganizerError {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly reason: string;

  constructor(reason: string, sourcePath: string, destinationPath: string) {
    super(reason, ErrorCodes.CONFLICT_UNRESOLVABLE, { sourcePath, destinationPath });
    this.sourcePath = sourcePath;
    this.destinationPath = destinationPath;
    this.reason = reason;
  }
}

export type FileOperation = 'move' | 'copy' | 'delete' | 'backup' | 'mkdir' | 'rollback';

/**
 * Unexpected filesystem failure during move, copy, delete or backup.
 */
export class OperationError extends OrganizerError {
  readonly operation: FileOperation;
  readonly filePath: string;
  readonly errno?: string;

  constructor(operation: FileOperation, filePath: string, cause: unknown) {
    const errno = cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : undefined;
    super(
      `File operation '${operation}' failed for ${filePath}: ${describeCause(cause, errno)}`,
      ErrorCodes.OPERATION_FAILED,
      { operation, filePath, errno }
    );
    this.operation = operation;
    this.filePath = filePath;
    this.errno = errno;
  }
}

export class ConfigurationError extends OrganizerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, context);
  }
}

function describeCause(cause: unknown, errno: string | undefined): string {
  const message = cause instanceof Error ? cause.message : String(cause);
  switch (errno) {
    case 'EACCES':
    case 'EPERM':
      return `Permission denied (${message}). Check file permissions.`;
    case 'ENOSPC':
      return `Insufficient disk space (${message}). Free up disk space and try again.`;
    case 'EROFS':
      return `Read-only filesystem (${message}). Choose a writable location.`;
    default:
      return message;
  }
}
