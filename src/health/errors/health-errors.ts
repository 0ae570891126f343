import { RowError } from '../interfaces/health-types';

/**
 * Base class for every error raised by the health processing engine.
 */
export class HealthProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HealthProcessingError';
  }
}

/**
 * A row could not be decoded into a telemetry sample.
 *
 * Row-level and non-fatal; also thrown for a whole batch when no valid
 * cell is left after ingestion.
 */
export class ParseError extends HealthProcessingError {
  declare readonly name: 'ParseError';

  constructor(
    message: string,
    public readonly rowErrors: RowError[] = [],
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * A decoded sample violates a range invariant (e.g. non-positive voltage).
 */
export class ValidationError extends HealthProcessingError {
  declare readonly name: 'ValidationError';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Too few samples, or numerically unstable input, for a fit.
 * Fails a single cell, never the batch.
 */
export class InsufficientDataError extends HealthProcessingError {
  constructor(
    message: string,
    public readonly sampleCount: number,
  ) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/**
 * The configuration cannot produce a trustworthy result. Fatal to the batch.
 */
export class ConfigurationError extends HealthProcessingError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
    );
    this.name = 'ConfigurationError';
  }
}
