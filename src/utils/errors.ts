import { ValidationIssue } from '@/types/detection.types';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a reading batch cannot be scored. Carries the HTTP status the
 * error handler should answer with and one issue per offending field.
 */
export class ValidationError extends Error {
  readonly statusCode = 422;
  readonly code = 'VALIDATION_ERROR';
  readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}
