/**
 * @fileoverview CorrelationContextAccessor - AsyncLocalStorage-based Ambient Slot
 *
 * @packageDocumentation
 * @module @correlate-js/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete ICorrelationContextAccessor on top of Node.js AsyncLocalStorage.
 * The active context follows a logical call chain through promises, timers
 * and callbacks without being passed as a parameter.
 *
 * ## Storage Model
 *
 * The storage holds an immutable *frame* per write. Writes never change a
 * frame in place; they enter a new one for the current execution:
 *
 * ```
 * isolate()                       frame A { context: undefined }
 * ├─ factory.create('order-1')    frame B { context: order-1 }
 * │  └─ isolate()                 frame C { context: order-1 }   (seeded copy)
 * │     ├─ factory.create('x')    frame D { context: x }
 * │     └─ factory.dispose(x)     frame E { context: order-1 }
 * └─ factory.dispose(order-1)     frame F { context: undefined }
 * ```
 *
 * A frame entered after a suspension belongs to that continuation alone,
 * so sibling chains forked from one `isolate()` never see each other's
 * writes. A frame entered before the first suspension of an async function
 * is shared with its caller; run such functions inside `isolate()` when
 * they start scopes of their own.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import { type CorrelationContext, type ICorrelationContextAccessor } from '../../domain/context';

/**
 * Snapshot of the ambient value for one execution.
 * @internal
 */
interface CorrelationContextFrame {
  readonly context: CorrelationContext | undefined;
}

/**
 * Singleton AsyncLocalStorage instance.
 *
 * @remarks
 * This MUST be a singleton: every accessor, and therefore every manager
 * and factory in the process, has to observe the same nesting.
 *
 * @internal
 */
const correlationStorage = new AsyncLocalStorage<CorrelationContextFrame>();

/**
 * CorrelationContextAccessor - process-wide ambient correlation slot.
 *
 * @remarks
 * Instances are stateless views over the shared storage; constructing
 * several of them is harmless.
 *
 * Assignments go through `AsyncLocalStorage.enterWith()`. Inside
 * `isolate()` they are undone when the callback returns; at the top of a
 * chain they last for the remainder of the current execution.
 *
 * @example
 * ```typescript
 * const accessor = new CorrelationContextAccessor();
 *
 * await accessor.isolate(async () => {
 *   accessor.correlationContext = new CorrelationContext('job-7');
 *   await step();
 *   accessor.correlationContext?.correlationId; // 'job-7'
 * });
 *
 * accessor.correlationContext; // undefined
 * ```
 */
export class CorrelationContextAccessor implements ICorrelationContextAccessor {
  get correlationContext(): CorrelationContext | undefined {
    return correlationStorage.getStore()?.context;
  }

  set correlationContext(value: CorrelationContext | undefined) {
    if (value === undefined && correlationStorage.getStore() === undefined) {
      return;
    }

    correlationStorage.enterWith({ context: value });
  }

  isolate<R>(callback: () => R): R {
    return correlationStorage.run({ context: this.correlationContext }, callback);
  }
}

let defaultAccessor: CorrelationContextAccessor | undefined;

/**
 * Resolve the process-wide accessor.
 *
 * @remarks
 * Used by components constructed without an explicit accessor. Since all
 * accessors share one storage, this returns a view equivalent to any other
 * `new CorrelationContextAccessor()`.
 */
export function getDefaultCorrelationContextAccessor(): ICorrelationContextAccessor {
  if (!defaultAccessor) {
    defaultAccessor = new CorrelationContextAccessor();
  }
  return defaultAccessor;
}
