/**
 * @file Request-level errors shared by the engine and the HTTP layer.
 */

export class ValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Validation failed: ${errors.join('; ')}`);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}
