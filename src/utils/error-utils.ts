/**
 * Utility functions for safe error handling with proper TypeScript types
 */

// Helper type for error-like objects
export interface ErrorLike {
  message?: unknown;
  code?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) if present
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Raised for configuration that cannot be loaded at all.
 * The CLI turns it into exit code 1.
 */
export class ConfigError extends Error {
  constructor(message: string, readonly configPath?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when another live process holds the instance lock.
 */
export class InstanceLockError extends Error {
  constructor(readonly lockPath: string, readonly ownerPid: number) {
    super(`Another courier instance (pid ${ownerPid}) is already running; lock file: ${lockPath}`);
    this.name = 'InstanceLockError';
  }
}
