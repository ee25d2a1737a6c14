/**
 * @fileoverview Infrastructure Layer Exports
 *
 * Concrete adapters: AsyncLocalStorage context, id generation, LogTape.
 *
 * @module @correlate-js/core/infrastructure
 * @license Apache-2.0
 */

export * from './context';
export * from './ids';
export * from './logging';
