/**
 * @fileoverview Correlate Options - Validated Configuration
 *
 * @module @correlate-js/core/application/config
 * @license Apache-2.0
 */

import { z } from 'zod';

import { CORRELATION_ID_KEY } from '../../domain/correlation';
import { InvalidCorrelateOptionsError } from '../../domain/errors';
import { DEFAULT_LOGGER_CATEGORY } from '../../infrastructure/logging';

/**
 * Schema for {@link CorrelateOptions}.
 */
export const correlateOptionsSchema = z.object({
  /** Strategy for new ids: random UUIDs or compact trace identifiers. */
  correlationIdGenerator: z.enum(['guid', 'traceIdentifier']).default('guid'),

  /** Log record property that carries the correlation id. */
  loggingScopeKey: z.string().trim().min(1).default(CORRELATION_ID_KEY),

  /** Root LogTape category for the library's own diagnostics. */
  loggerCategory: z
    .array(z.string().min(1))
    .min(1)
    .default(() => [...DEFAULT_LOGGER_CATEGORY]),
});

export type CorrelateOptions = z.infer<typeof correlateOptionsSchema>;

export type CorrelateOptionsInput = z.input<typeof correlateOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws InvalidCorrelateOptionsError if any option is invalid
 *
 * @example
 * ```typescript
 * parseCorrelateOptions({ correlationIdGenerator: 'traceIdentifier' });
 * // → { correlationIdGenerator: 'traceIdentifier', loggingScopeKey: 'CorrelationId', loggerCategory: ['correlate'] }
 * ```
 */
export function parseCorrelateOptions(input: unknown = {}): CorrelateOptions {
  const parsed = correlateOptionsSchema.safeParse(input);

  if (!parsed.success) {
    throw new InvalidCorrelateOptionsError(parsed.error.flatten().fieldErrors);
  }

  return parsed.data;
}
