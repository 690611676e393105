export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * HTTP failure with enough context for the caller to decide whether the
 * paper can be skipped or the run must stop.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly retryable: boolean,
    public readonly url: string,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** The model endpoint answered 429; the caller skips the paper. */
export class RateLimitError extends Error {
  constructor(message = 'Rate limited') {
    super(message);
    this.name = 'RateLimitError';
  }
}
