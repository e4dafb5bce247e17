/**
 * Error taxonomy shared by the store and the HTTP layer.
 */

export class MessageServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid input to a store operation. Nothing was mutated.
 */
export class ValidationError extends MessageServiceError {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }

  /**
   * Wraps schema issues, using the first issue's message as the error message.
   */
  static fromIssues(issues: ReadonlyArray<{ message: string }>, fallback = 'Invalid input'): ValidationError {
    const first = issues[0];
    return new ValidationError(first ? first.message : fallback, issues);
  }
}

export class NotFoundError extends MessageServiceError {}

/**
 * Invariant violation inside the store, e.g. an id collision.
 */
export class InternalError extends MessageServiceError {}
