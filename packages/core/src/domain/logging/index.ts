/**
 * @fileoverview Domain Logging Exports
 *
 * @module @correlate-js/core/domain/logging
 * @license Apache-2.0
 */

export { type ICorrelationLogScope } from './log-scope.interface';
