/**
 * @fileoverview Exception Enrichment - Correlation Metadata on Errors
 *
 * @module @correlate-js/core/application/correlation
 * @license Apache-2.0
 *
 * Failures keep their identity and type. The correlation id is added to a
 * `data` record on the error object itself:
 *
 * ```typescript
 * error.data; // { CorrelationId: '3b241101-…' }
 * ```
 */

import { CORRELATION_ID_KEY } from '../../domain/correlation';

function resolveDataRecord(error: object): object | undefined {
  if ('data' in error) {
    const { data } = error;
    return typeof data === 'object' && data !== null && Object.isExtensible(data) ? data : undefined;
  }

  if (!Object.isExtensible(error)) {
    return undefined;
  }

  const data: Record<string, unknown> = {};
  Object.defineProperty(error, 'data', {
    value: data,
    writable: true,
    configurable: true,
    enumerable: true,
  });
  return data;
}

/**
 * Tag `error` with a correlation id unless it already carries one.
 *
 * @param error - Caught failure; anything that is not an object is left alone
 * @param correlationId - Id of the scope the failure escaped from
 * @returns Whether the id was written
 *
 * @remarks
 * An existing id is never overwritten, so a failure that bubbles through
 * several nested scopes keeps the innermost one.
 */
export function enrichError(error: unknown, correlationId: string): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const data = resolveDataRecord(error);
  if (data === undefined || CORRELATION_ID_KEY in data) {
    return false;
  }

  return Reflect.set(data, CORRELATION_ID_KEY, correlationId);
}

/**
 * Read the correlation id a failure was tagged with, if any.
 */
export function getErrorCorrelationId(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('data' in error)) {
    return undefined;
  }

  const { data } = error;
  if (typeof data !== 'object' || data === null || !(CORRELATION_ID_KEY in data)) {
    return undefined;
  }

  const correlationId = data[CORRELATION_ID_KEY];
  return typeof correlationId === 'string' ? correlationId : undefined;
}
