/**
 * @fileoverview Correlation Manager Contracts
 *
 * @packageDocumentation
 * @module @correlate-js/core/domain/correlation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The public surface of the correlation manager, split into a synchronous
 * and an asynchronous port. Both have the same semantics:
 *
 * 1. Reuse the ambient correlation context, or start a new scope when none
 *    is active or an explicit id is given.
 * 2. Run the work inside that scope.
 * 3. Tag an escaping failure with the correlation id and optionally let
 *    `onException` suppress it.
 * 4. Restore the previous ambient context on every exit path.
 *
 * @version 1.0.0
 */

import { type OnException } from './exception-context';

/**
 * Synchronous correlation manager.
 *
 * @example
 * ```typescript
 * const total = manager.correlate(() => computeTotal(order));
 *
 * manager.correlate('import-42', () => {
 *   log.info('importing'); // tagged with import-42
 * });
 * ```
 */
export interface ICorrelationManager {
  correlate<T>(correlatedWork: () => T): T;
  correlate<T>(correlatedWork: () => T, onException: OnException<T> | undefined): T | undefined;
  correlate<T>(correlationId: string | undefined, correlatedWork: () => T): T;
  correlate<T>(
    correlationId: string | undefined,
    correlatedWork: () => T,
    onException: OnException<T> | undefined,
  ): T | undefined;
}

/**
 * Asynchronous correlation manager.
 *
 * @remarks
 * The work may suspend at any `await`; the ambient context follows it.
 * The manager adds no suspension points of its own.
 *
 * @example
 * ```typescript
 * const user = await manager.correlateAsync(() => users.load(id));
 * ```
 */
export interface IAsyncCorrelationManager {
  correlateAsync<T>(correlatedTask: () => Promise<T>): Promise<T>;
  correlateAsync<T>(
    correlatedTask: () => Promise<T>,
    onException: OnException<T> | undefined,
  ): Promise<T | undefined>;
  correlateAsync<T>(correlationId: string | undefined, correlatedTask: () => Promise<T>): Promise<T>;
  correlateAsync<T>(
    correlationId: string | undefined,
    correlatedTask: () => Promise<T>,
    onException: OnException<T> | undefined,
  ): Promise<T | undefined>;
}
