/**
 * A fetch failure worth retrying: rate limiting, 5xx, network trouble.
 */
export class TransientFetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransientFetchError";
    this.status = options.status;
  }
}

/**
 * A fetch failure that retrying cannot fix (bad credentials, unknown
 * resource, invalid query). Fails the category immediately.
 */
export class FatalFetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FatalFetchError";
    this.status = options.status;
  }
}

export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(category: string, timeoutMs: number) {
    super(`Fetching category ${category} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The dimensional load failed and its transaction was rolled back.
 */
export class LoadError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "LoadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
