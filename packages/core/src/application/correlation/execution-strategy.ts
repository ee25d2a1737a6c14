/**
 * @fileoverview Execution Strategies - Sync and Async Adapters
 *
 * @packageDocumentation
 * @module @correlate-js/core/application/correlation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * The correlation manager implements its state machine once. The only part
 * that differs between `correlate` and `correlateAsync` is how the body's
 * outcome is observed, which is what an ExecutionStrategy captures:
 *
 * ```
 * execute(body, recover, finalize)
 *   body succeeds  → result          → finalize → return result
 *   body fails     → recover(error)  → finalize → return / rethrow
 * ```
 *
 * @version 1.0.0
 */

/**
 * How a correlated body is run and settled.
 *
 * @template TResult - Value produced by the body or by `recover`
 * @template TReturn - What `execute` returns (`TResult` or `Promise<TResult>`)
 */
export interface ExecutionStrategy<TResult, TReturn> {
  /**
   * @param body - The correlated work
   * @param recover - Called with the failure; returns a substitute or throws
   * @param finalize - Called exactly once, after `recover` when it runs
   */
  execute(body: () => TReturn, recover: (error: unknown) => TResult, finalize: () => void): TReturn;
}

/**
 * Strategy for work that completes synchronously.
 */
export function synchronousExecution<TResult>(): ExecutionStrategy<TResult, TResult> {
  return {
    execute(body, recover, finalize) {
      try {
        return body();
      } catch (error) {
        return recover(error);
      } finally {
        finalize();
      }
    },
  };
}

/**
 * Strategy for promise-returning work.
 *
 * @remarks
 * A body that throws before returning its promise is treated exactly like
 * one that rejects.
 */
export function asynchronousExecution<TResult>(): ExecutionStrategy<TResult, Promise<TResult>> {
  return {
    async execute(body, recover, finalize) {
      try {
        return await body();
      } catch (error) {
        return recover(error);
      } finally {
        finalize();
      }
    },
  };
}
