/**
 * @fileoverview TraceIdentifierCorrelationIdFactory - Compact Request Ids
 *
 * @packageDocumentation
 * @module @correlate-js/core/infrastructure/ids
 * @license Apache-2.0
 *
 * Produces short, sortable, 13-character ids such as `'0HMVD1A7QK5L8'`,
 * the format web servers commonly use for request trace identifiers.
 *
 * ## Encoding
 *
 * A 64-bit counter is written in base 32, most significant digit first:
 *
 * ```
 * bits  63..60 59..55 ... 9..5  4..0
 * char  [0]    [1]    ... [11]  [12]
 * ```
 *
 * @version 1.0.0
 */

import { type ICorrelationIdFactory } from '../../domain/correlation';

const ENCODE_32_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUV';

/** 100 ns ticks between 0001-01-01 and the Unix epoch. */
const UNIX_EPOCH_TICKS = 621_355_968_000_000_000n;

const TICKS_PER_MILLISECOND = 10_000n;

/**
 * Current time in 100 ns ticks since 0001-01-01 UTC.
 * @internal
 */
function currentTicks(): bigint {
  return BigInt(Date.now()) * TICKS_PER_MILLISECOND + UNIX_EPOCH_TICKS;
}

/**
 * Encode an unsigned 64-bit value as 13 base-32 characters.
 * @internal
 */
export function encodeTraceIdentifier(id: bigint): string {
  let encoded = '';
  for (let shift = 60n; shift >= 0n; shift -= 5n) {
    encoded += ENCODE_32_CHARS.charAt(Number((id >> shift) & 31n));
  }
  return encoded;
}

/**
 * TraceIdentifierCorrelationIdFactory - counter-based compact ids.
 *
 * @remarks
 * The counter is seeded from the clock once and then incremented per id,
 * so ids from one factory are unique and increase until the counter wraps
 * at 2^64.
 *
 * @example
 * ```typescript
 * const ids = new TraceIdentifierCorrelationIdFactory(0n);
 * ids.create(); // '0000000000001'
 * ids.create(); // '0000000000002'
 * ```
 */
export class TraceIdentifierCorrelationIdFactory implements ICorrelationIdFactory {
  private lastId: bigint;

  /**
   * @param seed - Initial counter value; defaults to the current time in ticks
   */
  constructor(seed: bigint = currentTicks()) {
    this.lastId = BigInt.asUintN(64, seed);
  }

  create(): string {
    this.lastId = BigInt.asUintN(64, this.lastId + 1n);
    return encodeTraceIdentifier(this.lastId);
  }
}
