/**
 * @fileoverview ICorrelationIdFactory - Correlation Id Generation Port
 *
 * @module @correlate-js/core/domain/correlation
 * @license Apache-2.0
 */

/**
 * Produces new correlation ids.
 *
 * @remarks
 * Implementations must return a non-empty string on every call. The
 * correlation manager is agnostic to the format.
 */
export interface ICorrelationIdFactory {
  create(): string;
}
