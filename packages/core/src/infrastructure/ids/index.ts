/**
 * @fileoverview Correlation Id Factory Exports
 *
 * @module @correlate-js/core/infrastructure/ids
 * @license Apache-2.0
 */

export { GuidCorrelationIdFactory } from './guid-correlation-id-factory';

export {
  TraceIdentifierCorrelationIdFactory,
  encodeTraceIdentifier,
} from './trace-identifier-correlation-id-factory';
