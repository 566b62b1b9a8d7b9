export type ErrorCode = 'VALIDATION' | 'CONFIGURATION' | 'BACKEND';

export class VectorStoreError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: unknown
  ) {
    super(message);
    this.name = 'VectorStoreError';
    if (cause) {
      this.cause = cause;
    }
  }
}

/** Bad caller input or a malformed configuration block. */
export class ValidationError extends VectorStoreError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION', cause);
    this.name = 'ValidationError';
  }
}

/** Unknown backend, missing credentials, missing config file or block. */
export class ConfigurationError extends VectorStoreError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure reported by a backend SDK. The original error stays on `cause`.
 */
export class BackendError extends VectorStoreError {
  constructor(
    public readonly backend: string,
    public readonly operation: string,
    cause: unknown
  ) {
    super(`${backend} ${operation} failed: ${errorMessage(cause)}`, 'BACKEND', cause);
    this.name = 'BackendError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
