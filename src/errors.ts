/**
 * Error taxonomy shared by the fingerprint engine, sources and scheduler
 */

export type FailureReason = 'fetch' | 'storage' | 'cancelled';

export class SyncError extends Error {
  constructor(
    message: string,
    public code: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Network or transport failure, including a server that refuses partial content.
 * Retried by the scheduler unless `retryable` is false.
 */
export class FetchError extends SyncError {
  constructor(message: string, public status?: number, originalError?: Error, public retryable = true) {
    super(message, 'FETCH_ERROR', originalError);
    this.name = 'FetchError';
  }
}

/**
 * Local filesystem write failure. Never retried.
 */
export class StorageError extends SyncError {
  constructor(message: string, originalError?: Error) {
    super(message, 'STORAGE_ERROR', originalError);
    this.name = 'StorageError';
  }
}

export class CancelledError extends SyncError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class PolicyConfigError extends SyncError {
  constructor(message: string) {
    super(message, 'POLICY_CONFIG_ERROR');
    this.name = 'PolicyConfigError';
  }
}

export class ConfigError extends SyncError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map any error raised while processing a job onto the reported failure reason.
 * Index file failures are raised as StorageError.
 */
export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof CancelledError) {
    return 'cancelled';
  }
  if (error instanceof StorageError) {
    return 'storage';
  }
  return 'fetch';
}

// Errors raised by Node internals fail `instanceof Error` inside a Jest sandbox, so read fields instead
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === code;
}

export function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const name: unknown = Reflect.get(error, 'name');
  return name === 'AbortError' || name === 'CancelledError';
}
