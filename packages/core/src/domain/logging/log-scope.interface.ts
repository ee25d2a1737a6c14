/**
 * @fileoverview ICorrelationLogScope - Log Scope Port
 *
 * @module @correlate-js/core/domain/logging
 * @license Apache-2.0
 */

/**
 * Opens a logging scope that tags every record written inside it with a
 * correlation id.
 *
 * @remarks
 * Purely observational: implementations must return the callback's result
 * unchanged and let its errors propagate.
 */
export interface ICorrelationLogScope {
  /**
   * Run `callback` inside a log scope for `correlationId`.
   *
   * The scope closes when the callback returns (or, for a promise, for
   * every continuation created inside it).
   */
  run<R>(correlationId: string, callback: () => R): R;
}
