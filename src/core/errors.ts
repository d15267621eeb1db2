// src/core/errors.ts
export enum ErrorCode {
  TRANSPORT_ERROR = 'transport_error',
  AUTH_ERROR = 'auth_error',
  TOKEN_EXPIRED = 'token_expired',
  DATA_QUALITY = 'data_quality',
  PERSISTENCE_ERROR = 'persistence_error',
  MIRROR_ERROR = 'mirror_error',
  DISTRIBUTION_ERROR = 'distribution_error',
  INVALID_RESOURCE_KIND = 'invalid_resource_kind',
  MISSING_EPISODE_INDEX = 'missing_episode_index',
  CHECKPOINT_CORRUPT = 'checkpoint_corrupt',
  CONFIG_INVALID = 'config_invalid',
}

export class SyncError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

/**
 * Outcome of a call into an external collaborator.
 *
 * `retryable` only ever carries an expired session; transport retries are the
 * dispatcher's job, so anything else that failed arrives as `fatal`.
 */
export type AdapterResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; reason: 'token_expired'; message: string }
  | { kind: 'fatal'; error: SyncError };

export function ok<T>(value: T): AdapterResult<T> {
  return { kind: 'ok', value };
}

export function tokenExpired<T>(message: string): AdapterResult<T> {
  return { kind: 'retryable', reason: 'token_expired', message };
}

export function fatal<T>(error: SyncError): AdapterResult<T> {
  return { kind: 'fatal', error };
}

/** Errors that mean the catalog session is unusable; anything else is scoped to one item. */
export function isSessionError(error: SyncError): boolean {
  return error.code === ErrorCode.AUTH_ERROR || error.code === ErrorCode.TOKEN_EXPIRED;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toSyncError(error: unknown, code: ErrorCode): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  return new SyncError(code, describeError(error), false, undefined, {
    cause: describeError(error),
  });
}
