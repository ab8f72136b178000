/**
 * Error types for key generation
 *
 * Invariants:
 * - Compile-time problems are ExpressionError, DelimiterError or FieldPathError and are permanent
 *   until the expression changes
 * - Per-document problems are ResultError; callers should skip the document and continue
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { FieldPath } from "./types.js";

/**
 * Base class for all key generation errors
 */
export abstract class KeyGenError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the field/generator delimiter pair is unusable
 */
export class DelimiterError extends KeyGenError {
  readonly code = "E_DELIMITER";
}

/**
 * Thrown when an expression is invalid; `index` is the character position at which the problem was
 * detected
 */
export class ExpressionError extends KeyGenError {
  readonly code: string = "E_EXPRESSION";

  constructor(
    public readonly index: number,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`error in key expression at char ${index}, ${reason}`, options);
  }
}

/**
 * Thrown when compiling an empty expression
 */
export class EmptyExpressionError extends ExpressionError {
  readonly code: string = "E_EMPTY_EXPRESSION";

  constructor(options?: ErrorOptions) {
    super(0, "key generator contains an empty expression", options);
    this.message = this.reason;
  }
}

/**
 * Thrown by `parseFieldPath` when a field path is malformed
 */
export class FieldPathError extends KeyGenError {
  readonly code = "E_FIELD_PATH";

  constructor(
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(reason, options);
  }
}

export interface ResultErrorOptions extends ErrorOptions {
  /** Path of the field that could not be used */
  field?: FieldPath;
}

/**
 * Thrown when generating a key for a single document fails
 */
export class ResultError extends KeyGenError {
  readonly code = "E_RESULT";
  readonly field?: FieldPath;

  constructor(
    public readonly reason: string,
    options?: ResultErrorOptions
  ) {
    super(`key generation for document failed, ${reason}`, options);
    this.field = options?.field;
  }
}

export function isResultError(error: unknown): error is ResultError {
  return error instanceof ResultError;
}
