/**
 * @fileoverview GuidCorrelationIdFactory - Random UUID Correlation Ids
 *
 * @module @correlate-js/core/infrastructure/ids
 * @license Apache-2.0
 */

import { randomUUID } from 'crypto';

import { type ICorrelationIdFactory } from '../../domain/correlation';

/**
 * Generates a random RFC 4122 version 4 UUID per call,
 * e.g. `'3b241101-e2bb-4255-8caf-4136c566a962'`.
 */
export class GuidCorrelationIdFactory implements ICorrelationIdFactory {
  create(): string {
    return randomUUID();
  }
}
