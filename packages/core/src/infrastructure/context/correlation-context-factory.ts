/**
 * @fileoverview CorrelationContextFactory - Context Lifecycle
 *
 * @packageDocumentation
 * @module @correlate-js/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Creates correlation contexts, installs them into the accessor and removes
 * them again. The factory never owns the accessor.
 *
 * @version 1.0.0
 */

import {
  CorrelationContext,
  type ICorrelationContextAccessor,
  type ICorrelationContextFactory,
  type ICorrelationScope,
} from '../../domain/context';
import { type ICorrelationIdFactory } from '../../domain/correlation';
import { GuidCorrelationIdFactory } from '../ids';

/**
 * CorrelationContextFactory - default ICorrelationContextFactory.
 *
 * @remarks
 * Each installed context remembers the value it replaced. Disposal puts
 * that value back, but only while the context is still the active one;
 * disposing a stale or foreign context is silently ignored.
 *
 * @example Manual scope in a background loop
 * ```typescript
 * const factory = new CorrelationContextFactory(accessor);
 *
 * for (;;) {
 *   const scope = factory.begin();
 *   try {
 *     await processNextMessage();
 *   } finally {
 *     scope.dispose();
 *   }
 * }
 * ```
 */
export class CorrelationContextFactory implements ICorrelationContextFactory {
  /**
   * Installed context → value it replaced in the ambient slot.
   * @private
   */
  private readonly replaced = new WeakMap<CorrelationContext, CorrelationContext | undefined>();

  constructor(
    private readonly accessor: ICorrelationContextAccessor,
    private readonly correlationIdFactory: ICorrelationIdFactory = new GuidCorrelationIdFactory(),
  ) {}

  create(correlationId?: string): CorrelationContext {
    if (correlationId) {
      return this.install(new CorrelationContext(correlationId));
    }

    const ambient = this.accessor.correlationContext;
    if (ambient) {
      return ambient;
    }

    return this.install(new CorrelationContext(this.correlationIdFactory.create()));
  }

  dispose(context: CorrelationContext): void {
    if (!this.replaced.has(context) || this.accessor.correlationContext !== context) {
      return;
    }

    const previous = this.replaced.get(context);
    this.replaced.delete(context);
    this.accessor.correlationContext = previous;
  }

  /**
   * Start a scope and return a handle that ends it.
   *
   * @param correlationId - Explicit id; omitted means reuse or generate
   * @returns Scope handle; disposing it only uninstalls a context this call installed
   */
  begin(correlationId?: string): ICorrelationScope {
    const ambient = this.accessor.correlationContext;
    const context = this.create(correlationId);
    const ownsContext = context !== ambient;
    let disposed = false;

    return {
      context,
      dispose: () => {
        if (disposed) {
          return;
        }
        disposed = true;
        if (ownsContext) {
          this.dispose(context);
        }
      },
    };
  }

  private install(context: CorrelationContext): CorrelationContext {
    this.replaced.set(context, this.accessor.correlationContext);
    this.accessor.correlationContext = context;
    return context;
  }
}
