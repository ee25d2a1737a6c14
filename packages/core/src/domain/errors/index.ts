/**
 * @fileoverview Domain Error Exports
 *
 * @module @correlate-js/core/domain/errors
 * @license Apache-2.0
 */

export {
  CorrelateError,
  ArgumentError,
  ArgumentNullError,
  InvalidCorrelateOptionsError,
} from './correlate.errors';
