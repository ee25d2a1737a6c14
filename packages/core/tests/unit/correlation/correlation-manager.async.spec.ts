/**
 * @fileoverview CorrelationManager Unit Tests - Asynchronous Form
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  CorrelationManager,
  getErrorCorrelationId,
} from '../../../src/application/correlation/index.js';
import {
  ArgumentNullError,
  type CorrelationContext,
  type ICorrelationIdFactory,
} from '../../../src/domain/index.js';
import {
  CorrelationContextAccessor,
  CorrelationContextFactory,
} from '../../../src/infrastructure/context/index.js';
import { NullCorrelationLogScope } from '../../../src/infrastructure/logging/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const GENERATED_CORRELATION_ID = 'generated-correlation-id';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function createSut() {
  const accessor = new CorrelationContextAccessor();
  const createId = vi.fn(() => GENERATED_CORRELATION_ID);
  const correlationIdFactory: ICorrelationIdFactory = { create: createId };
  const contextFactory = new CorrelationContextFactory(accessor, correlationIdFactory);
  const manager = new CorrelationManager(contextFactory, correlationIdFactory, accessor, {
    logScope: new NullCorrelationLogScope(),
  });

  return { accessor, contextFactory, correlationIdFactory, createId, manager };
}

describe('CorrelationManager (async)', () => {
  // ============================================================================
  // Scope Lifecycle
  // ============================================================================

  describe('scope lifecycle', () => {
    it('should run a task inside a correlated context', async () => {
      const { accessor, manager } = createSut();
      let inside: CorrelationContext | undefined;

      expect(accessor.correlationContext).toBeUndefined();

      await manager.correlateAsync(async () => {
        inside = accessor.correlationContext;
      });

      expect(inside).toBeDefined();
      expect(accessor.correlationContext).toBeUndefined();
    });

    it('should keep the context across await points', async () => {
      const { accessor, manager } = createSut();

      const ids = await manager.correlateAsync('suspending', async () => {
        const before = accessor.correlationContext?.correlationId;
        await delay(5);
        const afterTimer = accessor.correlationContext?.correlationId;
        await new Promise<void>((resolve) => setImmediate(resolve));
        const afterImmediate = accessor.correlationContext?.correlationId;
        return [before, afterTimer, afterImmediate];
      });

      expect(ids).toEqual(['suspending', 'suspending', 'suspending']);
    });

    it('should not leak the context to the caller before the task settles', async () => {
      const { accessor, manager } = createSut();

      const pending = manager.correlateAsync(async () => {
        await delay(5);
      });

      expect(accessor.correlationContext).toBeUndefined();
      await pending;
      expect(accessor.correlationContext).toBeUndefined();
    });

    it('should return the value produced by the task', async () => {
      const { accessor, manager } = createSut();

      const actual = await manager.correlateAsync(() => {
        expect(accessor.correlationContext).toBeDefined();
        return Promise.resolve(12345);
      });

      expect(actual).toBe(12345);
      expect(accessor.correlationContext).toBeUndefined();
    });
  });

  // ============================================================================
  // Correlation Id Resolution
  // ============================================================================

  describe('correlation id resolution', () => {
    it('should generate an id when none is given', async () => {
      const { accessor, createId, manager } = createSut();

      const correlationId = await manager.correlateAsync(
        async () => accessor.correlationContext?.correlationId,
      );

      expect(correlationId).toBe(GENERATED_CORRELATION_ID);
      expect(createId).toHaveBeenCalledTimes(1);
    });

    it('should use an explicit id without generating one', async () => {
      const { accessor, createId, manager } = createSut();

      const correlationId = await manager.correlateAsync(
        'my-correlation-id',
        async () => accessor.correlationContext?.correlationId,
      );

      expect(correlationId).toBe('my-correlation-id');
      expect(createId).not.toHaveBeenCalled();
    });
  });

  // ============================================================================
  // Nesting
  // ============================================================================

  describe('nesting', () => {
    it('should start a new context for an explicit id and restore the parent', async () => {
      const { accessor, manager } = createSut();

      await manager.correlateAsync('parentContextId', async () => {
        const parentContext = accessor.correlationContext;
        expect(parentContext?.correlationId).toBe('parentContextId');

        await manager.correlateAsync('innerContextId', async () => {
          await delay(1);
          const innerContext = accessor.correlationContext;
          expect(innerContext).not.toBe(parentContext);
          expect(innerContext?.correlationId).toBe('innerContextId');
        });

        expect(accessor.correlationContext).toBe(parentContext);
      });
    });

    it('should create a distinct context for the same explicit id', async () => {
      const { accessor, manager } = createSut();

      await manager.correlateAsync(async () => {
        const parentContext = accessor.correlationContext;
        if (!parentContext) {
          throw new Error('Expected an active context');
        }

        await manager.correlateAsync(parentContext.correlationId, async () => {
          const innerContext = accessor.correlationContext;
          expect(innerContext).not.toBe(parentContext);
          expect(innerContext).toEqual(parentContext);
        });
      });
    });

    it('should reuse the ambient context when no id is given', async () => {
      const { accessor, createId, manager } = createSut();

      await manager.correlateAsync(async () => {
        const parentContext = accessor.correlationContext;

        await manager.correlateAsync(async () => {
          await delay(1);
          expect(accessor.correlationContext).toBe(parentContext);
        });

        expect(accessor.correlationContext).toBe(parentContext);
      });

      expect(createId).toHaveBeenCalledTimes(1);
    });

    it('should mix sync and async scopes', async () => {
      const { accessor, manager } = createSut();

      await manager.correlateAsync('async-outer', async () => {
        const innerId = manager.correlate('sync-inner', () => accessor.correlationContext?.correlationId);
        expect(innerId).toBe('sync-inner');

        await delay(1);
        expect(accessor.correlationContext?.correlationId).toBe('async-outer');
      });
    });
  });

  // ============================================================================
  // Deprecated Constructor
  // ============================================================================

  describe('deprecated constructor', () => {
    it('should observe nesting started by another manager instance', async () => {
      const { accessor, contextFactory, correlationIdFactory, manager } = createSut();
      const legacy = new CorrelationManager(contextFactory, correlationIdFactory);

      await manager.correlateAsync('parentContextId', async () => {
        const parentContext = accessor.correlationContext;

        await legacy.correlateAsync(async () => {
          expect(accessor.correlationContext).toBe(parentContext);
        });

        await legacy.correlateAsync('legacy-inner', async () => {
          expect(accessor.correlationContext?.correlationId).toBe('legacy-inner');
        });

        expect(accessor.correlationContext).toBe(parentContext);
      });

      expect(accessor.correlationContext).toBeUndefined();
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe('failures', () => {
    it('should reject with the original error after a suspension', async () => {
      const { manager } = createSut();
      const exception = new Error('failed');

      await expect(
        manager.correlateAsync(undefined, async () => {
          await delay(1);
          throw exception;
        }),
      ).rejects.toBe(exception);
    });

    it('should treat a synchronous throw like a rejection', async () => {
      const { accessor, manager } = createSut();
      const exception = new Error('failed');

      await expect(
        manager.correlateAsync(() => {
          throw exception;
        }),
      ).rejects.toBe(exception);

      expect(getErrorCorrelationId(exception)).toBe(GENERATED_CORRELATION_ID);
      expect(accessor.correlationContext).toBeUndefined();
    });

    it('should keep the innermost correlation id across async scopes', async () => {
      const { manager } = createSut();
      const exception = new Error('failed');

      await expect(
        manager.correlateAsync('outer', async () => {
          await manager.correlateAsync('inner', async () => {
            await delay(1);
            throw exception;
          });
        }),
      ).rejects.toBe(exception);

      expect(getErrorCorrelationId(exception)).toBe('inner');
    });
  });

  // ============================================================================
  // Exception Handlers
  // ============================================================================

  describe('onException', () => {
    it('should resolve when the handler marks the exception handled', async () => {
      const { manager } = createSut();
      const exception = new Error('failed');

      const result = await manager.correlateAsync(
        undefined,
        () => {
          throw exception;
        },
        (ctx) => {
          expect(ctx.correlationContext.correlationId).toBe(GENERATED_CORRELATION_ID);
          expect(ctx.error).toBe(exception);
          ctx.isExceptionHandled = true;
        },
      );

      expect(result).toBeUndefined();
    });

    it('should resolve with the replacement result', async () => {
      const { manager } = createSut();

      const result = await manager.correlateAsync<number>(
        async () => {
          await delay(1);
          throw new Error('failed');
        },
        (ctx) => {
          ctx.result = 12345;
        },
      );

      expect(result).toBe(12345);
    });

    it('should reject when the handler leaves the exception unhandled', async () => {
      const { manager } = createSut();
      const exception = new Error('failed');

      await expect(
        manager.correlateAsync(
          () => {
            throw exception;
          },
          (ctx) => {
            ctx.isExceptionHandled = false;
          },
        ),
      ).rejects.toBe(exception);
    });

    it('should reject with the handler error and still dispose', async () => {
      const { accessor, manager } = createSut();
      const handlerError = new Error('handler failed');

      await manager.correlateAsync('outer', async () => {
        const outer = accessor.correlationContext;

        await expect(
          manager.correlateAsync(
            'inner',
            async () => {
              throw new Error('failed');
            },
            () => {
              throw handlerError;
            },
          ),
        ).rejects.toBe(handlerError);

        expect(getErrorCorrelationId(handlerError)).toBe('inner');
        expect(accessor.correlationContext).toBe(outer);
      });
    });
  });

  // ============================================================================
  // Argument Validation
  // ============================================================================

  describe('argument validation', () => {
    it('should reject with ArgumentNullError naming the missing task', async () => {
      const { accessor, createId, manager } = createSut();
      const correlatedTask = undefined as unknown as () => Promise<void>;

      const pending = manager.correlateAsync(undefined, correlatedTask, undefined);

      await expect(pending).rejects.toBeInstanceOf(ArgumentNullError);
      await expect(pending).rejects.toHaveProperty('paramName', 'correlatedTask');
      expect(createId).not.toHaveBeenCalled();
      expect(accessor.correlationContext).toBeUndefined();
    });
  });
});
