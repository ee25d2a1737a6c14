/**
 * @fileoverview Application Layer Exports
 *
 * The correlation manager and the composition root.
 *
 * @module @correlate-js/core/application
 * @license Apache-2.0
 */

export * from './correlation';
export * from './config';
