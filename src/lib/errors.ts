/**
 * Rejection produced by `Limiter.limitByKeys`. Carries the status code and
 * body the caller should answer with.
 */
export class HttpError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

/**
 * A bucket reached a token count outside `[0, capacity]`. Never retryable:
 * it means the bucket arithmetic or its serialization is broken.
 */
export class BucketInvariantError extends Error {
  readonly tokens: number;
  readonly capacity: number;

  constructor(tokens: number, capacity: number) {
    super(`token bucket invariant violated: tokens=${tokens} capacity=${capacity}`);
    this.name = 'BucketInvariantError';
    this.tokens = tokens;
    this.capacity = capacity;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
