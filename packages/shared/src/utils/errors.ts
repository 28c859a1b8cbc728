import type { ZodError } from 'zod';

export class HostPulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'HostPulseError';
    this.code = code;
  }
}

export class ConfigValidationError extends HostPulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class SnapshotValidationError extends HostPulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Snapshot validation failed: ${errors.join('; ')}`, 'SNAPSHOT_VALIDATION_ERROR');
    this.name = 'SnapshotValidationError';
    this.errors = errors;
  }
}

export class StorageError extends HostPulseError {
  public readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR');
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export class InvalidQueryError extends HostPulseError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/** Flattens zod issues into `path: message` lines for the error classes above. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
