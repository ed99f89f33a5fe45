export type SyncErrorKind =
  | 'configuration'
  | 'credential_not_found'
  | 'authentication'
  | 'api'
  | 'store';

export class SyncError extends Error {
  constructor(
    public readonly kind: SyncErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncError';
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

export class CredentialNotFoundError extends SyncError {
  constructor(public readonly keyPath: string) {
    super('credential_not_found', `Credential file not found at: ${keyPath}`);
    this.name = 'CredentialNotFoundError';
  }
}

export class AuthenticationError extends SyncError {
  constructor(cause: unknown) {
    super('authentication', `GSC authentication error: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'AuthenticationError';
  }
}

export class ApiError extends SyncError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly reason?: string,
    cause?: unknown
  ) {
    super('api', message, { cause });
    this.name = 'ApiError';
  }
}

/**
 * Store failure. The counts describe rows processed before the transaction
 * was rolled back, so none of them are committed.
 */
export class StoreError extends SyncError {
  constructor(
    message: string,
    public readonly inserted: number,
    public readonly updated: number,
    cause?: unknown
  ) {
    super('store', message, { cause });
    this.name = 'StoreError';
  }
}

// Errors raised by Node internals may come from another realm, so these
// helpers check shape instead of `instanceof Error`
export function describeError(error: unknown): string {
  if (isRecord(error) && typeof error['message'] === 'string') {
    return error['message'];
  }
  return String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && (error['code'] === 'ENOENT' || error['code'] === 'ENOTDIR');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
