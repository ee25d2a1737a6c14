/**
 * @fileoverview Infrastructure Logging Exports
 *
 * @module @correlate-js/core/infrastructure/logging
 * @license Apache-2.0
 */

export {
  DEFAULT_LOGGER_CATEGORY,
  getCorrelateLogger,
  LogTapeCorrelationLogScope,
  NullCorrelationLogScope,
} from './logtape-log-scope';
