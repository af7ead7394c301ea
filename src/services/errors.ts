/**
 * Errors raised by the analytics core and its call sites. Each carries the
 * HTTP status the error-handler plugin replies with.
 */
export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'AnalyticsError';
  }
}

/** Malformed or degenerate numeric input (singular regression, too few points). */
export class InvalidInputError extends AnalyticsError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'InvalidInputError';
  }
}

/** A prediction call site received fewer readings than it requires. */
export class InsufficientDataError extends AnalyticsError {
  constructor(
    public readonly required: number,
    public readonly received: number,
  ) {
    super('Insufficient historical data for prediction', 400);
    this.name = 'InsufficientDataError';
  }
}
