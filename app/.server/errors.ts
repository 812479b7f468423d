/**
 * Error types raised by the store, capture storage and settings layers
 */

export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StoreError';
    this.operation = operation;
  }
}

/**
 * The capture directory (or database directory) could not be created or written
 */
export class StorageUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Storage unavailable at ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageUnavailableError';
    this.path = path;
  }
}

export class SettingsValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
