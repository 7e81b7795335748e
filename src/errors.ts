/**
 * Errors that escape as exceptions. Per-URL network and HTTP problems are
 * returned as FetchResult values instead.
 */

export class ConfigError extends Error {
  readonly kind = 'ConfigError';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StorageError extends Error {
  readonly kind = 'StorageError';

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error && err.message ? err.message : String(err);
}
