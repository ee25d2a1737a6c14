/**
 * @fileoverview Application Correlation Module Exports
 *
 * @packageDocumentation
 * @module @correlate-js/core/application/correlation
 * @license Apache-2.0
 */

export { CorrelationManager, type CorrelationManagerOptions } from './correlation-manager';

export { enrichError, getErrorCorrelationId } from './exception-enrichment';

export {
  asynchronousExecution,
  synchronousExecution,
  type ExecutionStrategy,
} from './execution-strategy';
