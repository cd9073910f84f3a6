/**
 * Custom error classes for the warehouse API.
 * Each maps to one HTTP status in the global error handler (see app.ts).
 */

/**
 * Error thrown when a referenced entity does not exist.
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when input or a business rule is violated
 * (binding a non-bindable quote, unknown payment type, ...).
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when the LLM gateway has no usable API key.
 */
export class LLMAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMAuthError';
    Object.setPrototypeOf(this, LLMAuthError.prototype);
  }
}

/**
 * Error thrown when LLM API calls fail.
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when SQL execution fails.
 */
export class SQLExecutionError extends Error {
  public readonly sql?: string;

  constructor(message: string, sql?: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}
