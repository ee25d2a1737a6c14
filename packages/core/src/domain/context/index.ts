/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Technology-agnostic correlation context types. The AsyncLocalStorage
 * implementation lives in the Infrastructure layer.
 */

export { CorrelationContext } from './correlation-context';

export {
  type ICorrelationContextAccessor,
  type ICorrelationContextFactory,
  type ICorrelationScope,
} from './context.interface';
