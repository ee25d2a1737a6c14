/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @correlate-js/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The AsyncLocalStorage-based implementation of the correlation context
 * contracts:
 *
 * - **CorrelationContextAccessor**: the ambient slot
 * - **CorrelationContextFactory**: create / install / dispose
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   CorrelationContextAccessor,
 *   CorrelationContextFactory,
 * } from '@correlate-js/core/infrastructure/context';
 *
 * const accessor = new CorrelationContextAccessor();
 * const factory = new CorrelationContextFactory(accessor);
 *
 * accessor.isolate(() => {
 *   const scope = factory.begin('nightly-sync');
 *   try {
 *     runSync();
 *   } finally {
 *     scope.dispose();
 *   }
 * });
 * ```
 */

export {
  CorrelationContextAccessor,
  getDefaultCorrelationContextAccessor,
} from './correlation-context-accessor';

export { CorrelationContextFactory } from './correlation-context-factory';
