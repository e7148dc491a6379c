// Utility types for the organizer

// Generic result type for operations that can succeed or fail
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

// Narrow an unknown caught value to a Node.js system error
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Type guard for string literal unions backed by a const array
export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((item) => item === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
