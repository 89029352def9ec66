export type ErrorCode = 'fetch_failed' | 'parse_failed' | 'store_unavailable' | 'not_found';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, non-2xx status or browser failure. Retryable. */
export class FetchError extends AppError {
  readonly code = 'fetch_failed';

  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Page layout changed or a value did not convert. Never retried. */
export class ParseError extends AppError {
  readonly code = 'parse_failed';

  constructor(
    message: string,
    readonly sourceId: string,
    readonly symbol: string,
    options?: { cause?: unknown },
  ) {
    super(`[${sourceId}:${symbol}] ${message}`, options);
  }
}

export class StoreError extends AppError {
  readonly code = 'store_unavailable';

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends AppError {
  readonly code = 'not_found';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
