/**
 * @fileoverview @correlate-js/core - Main Entry Point
 *
 * Correlation id propagation for Node.js. Ties together every log record,
 * outgoing call and error raised during one logical operation, across
 * synchronous and asynchronous call chains.
 *
 * @packageDocumentation
 * @module @correlate-js/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { createCorrelate, getErrorCorrelationId } from '@correlate-js/core';
 *
 * const { manager, accessor } = createCorrelate();
 *
 * try {
 *   await manager.correlateAsync(async () => {
 *     console.log(accessor.correlationContext?.correlationId);
 *     await processOrder();
 *   });
 * } catch (error) {
 *   console.error('failed', getErrorCorrelationId(error));
 * }
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts and values - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Correlation manager, enrichment, options, composition root
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// AsyncLocalStorage context, id generation, LogTape
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
