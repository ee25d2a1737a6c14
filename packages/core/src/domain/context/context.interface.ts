/**
 * @fileoverview Correlation Context Contracts - Accessor and Factory
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * These interfaces define how the ambient correlation context is read,
 * installed and removed, without specifying HOW it is stored. The
 * AsyncLocalStorage implementation lives in the Infrastructure layer.
 *
 * ## Dependency Rule Compliance
 *
 * ```
 * Domain Layer (this file)
 *     ↑ depends on nothing external
 *     |
 * Application Layer (CorrelationManager)
 *     ↑ depends on Domain interfaces
 *     |
 * Infrastructure Layer
 *     ↑ implements Domain interfaces
 * ```
 *
 * @version 1.0.0
 */

import { type CorrelationContext } from './correlation-context';

/**
 * ICorrelationContextAccessor - the ambient slot holding the active context.
 *
 * @remarks
 * **Isolation Contract:**
 *
 * - One logical call chain sees a consistent value across `await` points.
 * - Concurrent independent chains never observe each other's value.
 *
 * A plain module-level variable does NOT satisfy this contract.
 *
 * @example
 * ```typescript
 * function audit(accessor: ICorrelationContextAccessor) {
 *   const id = accessor.correlationContext?.correlationId;
 *   console.log('audit', { id });
 * }
 * ```
 */
export interface ICorrelationContextAccessor {
  /**
   * The active context for the current call chain, or `undefined`.
   *
   * Writers are context factories; everything else should only read.
   */
  correlationContext: CorrelationContext | undefined;

  /**
   * Run a callback in a child scope of the current call chain.
   *
   * @param callback - Function to run
   * @returns Result of the callback
   *
   * @remarks
   * The child starts with the current value. Assignments to
   * `correlationContext` made inside the callback (and its async
   * continuations) are not visible to the caller once it returns.
   */
  isolate<R>(callback: () => R): R;
}

/**
 * ICorrelationContextFactory - owns the create → install → uninstall lifecycle.
 *
 * @remarks
 * The factory writes to the accessor but never owns it. Nesting follows from
 * each installed context remembering the value it replaced.
 */
export interface ICorrelationContextFactory {
  /**
   * Create and install a correlation context.
   *
   * @param correlationId - Explicit id; empty or omitted means "none"
   * @returns The active context after the call
   *
   * @remarks
   * - With an explicit id, a new context is always built and installed.
   * - Without one, an active ambient context is returned as-is (same
   *   instance, nothing installed). Otherwise a new id is generated.
   */
  create(correlationId?: string): CorrelationContext;

  /**
   * Uninstall a context, restoring the value it replaced.
   *
   * @remarks
   * A no-op unless `context` was installed by this factory and is still
   * the active one. Idempotent.
   */
  dispose(context: CorrelationContext): void;
}

/**
 * Handle returned for manual scope management.
 *
 * @example
 * ```typescript
 * const scope = contextFactory.begin();
 * try {
 *   await pollQueue();
 * } finally {
 *   scope.dispose();
 * }
 * ```
 */
export interface ICorrelationScope {
  /** The context active for this scope. */
  readonly context: CorrelationContext;

  /** End the scope. Safe to call more than once. */
  dispose(): void;
}
