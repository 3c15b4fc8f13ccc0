export type YieldErrorCode = 'invalid_input' | 'no_data' | 'fetch_error' | 'rate_limited';

export class YieldError extends Error {
  readonly code: YieldErrorCode;

  constructor(code: YieldErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidInputError extends YieldError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export class NoDataError extends YieldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('no_data', message, options);
  }
}

export class FetchError extends YieldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fetch_error', message, options);
  }
}

/** Provider throttling. Ends a seek scan; callers keep what was collected before it. */
export class RateLimitedError extends YieldError {
  constructor(message = 'provider rate limit reached', options?: { cause?: unknown }) {
    super('rate_limited', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
