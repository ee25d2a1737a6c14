/**
 * @fileoverview CorrelationContext Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { ArgumentError, CorrelationContext } from '../../../src/domain/index.js';

describe('CorrelationContext', () => {
  it('should expose its correlation id', () => {
    expect(new CorrelationContext('order-1').correlationId).toBe('order-1');
  });

  it('should be immutable', () => {
    const context = new CorrelationContext('order-1');

    expect(Object.isFrozen(context)).toBe(true);
    expect(() => Reflect.set(context, 'correlationId', 'changed')).not.toThrow();
    expect(context.correlationId).toBe('order-1');
  });

  it('should reject an empty id', () => {
    expect(() => new CorrelationContext('')).toThrow(ArgumentError);
  });

  it('should compare by value with equals()', () => {
    const a = new CorrelationContext('same');
    const b = new CorrelationContext('same');

    expect(a).not.toBe(b);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new CorrelationContext('other'))).toBe(false);
    expect(a.equals(undefined)).toBe(false);
  });

  it('should describe itself', () => {
    expect(String(new CorrelationContext('order-1'))).toBe(
      'CorrelationContext(correlationId=order-1)',
    );
  });
});
