/**
 * @fileoverview CorrelationContext - Immutable Correlation Value
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * A correlation context holds the id of one logical operation. It is created
 * once per scope by the context factory and never changes afterwards.
 *
 * @version 1.0.0
 */

import { ArgumentError } from '../errors';

/**
 * CorrelationContext - the value installed in the ambient slot for a scope.
 *
 * @remarks
 * Identity matters: a nested scope started with an explicit id always gets a
 * new instance, even when the id equals the outer one. Use {@link equals}
 * to compare by value.
 *
 * @example
 * ```typescript
 * const outer = new CorrelationContext('order-1');
 * const inner = new CorrelationContext('order-1');
 *
 * outer === inner;      // false
 * outer.equals(inner);  // true
 * ```
 */
export class CorrelationContext {
  /**
   * The correlation id. Never empty.
   */
  public readonly correlationId: string;

  constructor(correlationId: string) {
    if (typeof correlationId !== 'string' || correlationId.length === 0) {
      throw new ArgumentError('correlationId', 'A correlation id must be a non-empty string.');
    }

    this.correlationId = correlationId;
    Object.freeze(this);
  }

  /**
   * Value equality on the correlation id.
   */
  equals(other: CorrelationContext | undefined): boolean {
    return other !== undefined && other.correlationId === this.correlationId;
  }

  toString(): string {
    return `CorrelationContext(correlationId=${this.correlationId})`;
  }
}
