/**
 * @fileoverview ExceptionContext - Failure Handling Record
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/correlation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * One ExceptionContext is created per failure caught inside a correlated
 * scope, handed by reference to the caller's `onException` handler, read
 * back once and then discarded.
 *
 * @version 1.0.0
 */

import { type CorrelationContext } from '../context';

/**
 * Mutable record describing a failure inside a correlation scope.
 *
 * @template T - Result type of the correlated work
 *
 * @remarks
 * Setting {@link result} also marks the exception as handled, so a handler
 * that only supplies a replacement value does not have to flip the flag.
 *
 * @example
 * ```typescript
 * const count = manager.correlate(
 *   () => loadCount(),
 *   (ctx) => {
 *     if (ctx.error instanceof NotFoundError) {
 *       ctx.result = 0;
 *     }
 *   },
 * );
 * ```
 */
export class ExceptionContext<T = void> {
  /**
   * Whether the handler suppressed the failure.
   */
  public isExceptionHandled = false;

  private replacement: T | undefined;

  constructor(
    public readonly correlationContext: CorrelationContext,
    public readonly error: unknown,
  ) {}

  /**
   * Value returned instead of rethrowing when the failure is handled.
   */
  get result(): T | undefined {
    return this.replacement;
  }

  set result(value: T | undefined) {
    this.replacement = value;
    this.isExceptionHandled = true;
  }
}

/**
 * Handler invoked when correlated work fails.
 *
 * @remarks
 * Errors thrown by the handler replace the original failure.
 */
export type OnException<T = void> = (context: ExceptionContext<T>) => void;
