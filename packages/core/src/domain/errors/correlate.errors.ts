/**
 * @fileoverview Correlate Errors - Library Error Classes
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/errors
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Errors raised by the library itself. Failures thrown by correlated work
 * are never wrapped in one of these; they propagate as the original object,
 * enriched with the correlation id (see `enrichError`).
 *
 * @version 1.0.0
 */

/**
 * Base error class for all errors raised by the library.
 *
 * @example
 * ```typescript
 * try {
 *   parseCorrelateOptions(raw);
 * } catch (error) {
 *   if (error instanceof CorrelateError) {
 *     console.error('Correlate:', error.message);
 *   }
 * }
 * ```
 */
export abstract class CorrelateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when an argument has an invalid value.
 */
export class ArgumentError extends CorrelateError {
  /**
   * Name of the offending parameter.
   */
  public readonly paramName: string;

  constructor(paramName: string, message?: string) {
    super(message ?? `Argument '${paramName}' is invalid.`);
    this.paramName = paramName;
  }
}

/**
 * Error thrown when a required argument is `null` or `undefined`.
 *
 * @remarks
 * Raised by the correlation manager before any context is created when the
 * work callable is missing.
 */
export class ArgumentNullError extends ArgumentError {
  constructor(paramName: string) {
    super(paramName, `Value cannot be null or undefined. (Parameter '${paramName}')`);
  }
}

/**
 * Error thrown when correlate options fail validation.
 */
export class InvalidCorrelateOptionsError extends CorrelateError {
  /**
   * Validation messages keyed by option name.
   */
  public readonly fieldErrors: Readonly<Record<string, string[] | undefined>>;

  constructor(fieldErrors: Record<string, string[] | undefined>) {
    super(`Invalid correlate options: ${JSON.stringify(fieldErrors)}`);
    this.fieldErrors = fieldErrors;
  }
}
