/**
 * @fileoverview Well-known keys shared by the manager, enrichment and logging.
 *
 * @module @correlate-js/core/domain/correlation
 * @license Apache-2.0
 */

/**
 * Key under which the correlation id is stored in `error.data` and, by
 * default, in log record properties.
 */
export const CORRELATION_ID_KEY = 'CorrelationId' as const;
