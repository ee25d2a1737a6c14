/**
 * @fileoverview LogTape Log Scope - Correlation-tagged Log Records
 *
 * @packageDocumentation
 * @module @correlate-js/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Adapts ICorrelationLogScope to LogTape implicit contexts. Every record
 * written inside the scope, by any LogTape logger, carries the correlation
 * id as a property.
 *
 * ## Application Setup
 *
 * A library never configures LogTape. Implicit contexts only take effect
 * when the application passes a context-local storage:
 *
 * ```typescript
 * import { AsyncLocalStorage } from 'node:async_hooks';
 * import { configure, getConsoleSink } from '@logtape/logtape';
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   loggers: [{ category: ['my-app'], sinks: ['console'], lowestLevel: 'info' }],
 *   contextLocalStorage: new AsyncLocalStorage(),
 * });
 * ```
 *
 * Without it, LogTape runs the callback untouched and reports the missing
 * storage through its meta logger.
 *
 * @version 1.0.0
 */

import { getLogger, withContext, type Logger } from '@logtape/logtape';

import { CORRELATION_ID_KEY } from '../../domain/correlation';
import { type ICorrelationLogScope } from '../../domain/logging';

/**
 * Root category for the library's own loggers.
 */
export const DEFAULT_LOGGER_CATEGORY: readonly string[] = ['correlate'];

/**
 * Get a library logger below `category`.
 *
 * @param category - Root category, e.g. `['correlate']`
 * @param subsystem - Child category name
 */
export function getCorrelateLogger(category: readonly string[], subsystem: string): Logger {
  return getLogger([...category, subsystem]);
}

/**
 * LogTapeCorrelationLogScope - tags records with the correlation id.
 *
 * @example
 * ```typescript
 * const scope = new LogTapeCorrelationLogScope();
 * scope.run('order-1', () => {
 *   getLogger(['my-app']).info('Placing order');
 *   // record.properties → { CorrelationId: 'order-1' }
 * });
 * ```
 */
export class LogTapeCorrelationLogScope implements ICorrelationLogScope {
  /**
   * @param propertyKey - Record property that receives the id
   */
  constructor(private readonly propertyKey: string = CORRELATION_ID_KEY) {}

  run<R>(correlationId: string, callback: () => R): R {
    return withContext({ [this.propertyKey]: correlationId }, callback);
  }
}

/**
 * Log scope that does nothing. Useful when logging is disabled.
 */
export class NullCorrelationLogScope implements ICorrelationLogScope {
  run<R>(_correlationId: string, callback: () => R): R {
    return callback();
  }
}
