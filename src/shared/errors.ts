export class NewsfoldError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'NewsfoldError';
  }
}

export class ConfigError extends NewsfoldError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends NewsfoldError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class CacheError extends NewsfoldError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CACHE_ERROR', details);
    this.name = 'CacheError';
  }
}

export class InputError extends NewsfoldError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', details);
    this.name = 'InputError';
  }
}

export type FetchFailureReason = 'timeout' | 'network' | 'http' | 'aborted';

export class FetchError extends NewsfoldError {
  constructor(
    message: string,
    public readonly reason: FetchFailureReason,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', { reason, ...details });
    this.name = 'FetchError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
