/**
 * @fileoverview Application Config Module Exports
 *
 * @module @correlate-js/core/application/config
 * @license Apache-2.0
 */

export {
  correlateOptionsSchema,
  parseCorrelateOptions,
  type CorrelateOptions,
  type CorrelateOptionsInput,
} from './correlate-options';

export { createCorrelate, createCorrelationIdFactory, type Correlate } from './create-correlate';
