/**
 * @fileoverview Domain Correlation Module Exports
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/correlation
 * @license Apache-2.0
 */

export { CORRELATION_ID_KEY } from './correlate-constants';

export { type ICorrelationIdFactory } from './correlation-id-factory.interface';

export { ExceptionContext, type OnException } from './exception-context';

export {
  type ICorrelationManager,
  type IAsyncCorrelationManager,
} from './correlation-manager.interface';
