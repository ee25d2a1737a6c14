/**
 * @fileoverview CorrelationManager - Correlation Scope State Machine
 *
 * @packageDocumentation
 * @module @correlate-js/core/application/correlation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Runs units of work inside correlation scopes. Every invocation walks the
 * same states, whether the work is synchronous or returns a promise:
 *
 * ```
 * Start
 *   → ContextResolved        reuse ambient, or create + install
 *   → Executing
 *   → Succeeded | FailureCaught → (Unhandled | HandledWithResult)
 *   → Disposed               always, in `finally`
 *   → ReturnValue | Rethrow
 * ```
 *
 * Each invocation runs inside `accessor.isolate()`, so concurrent
 * invocations never share an ambient slot and the caller's slot is left
 * exactly as it was.
 *
 * @version 1.0.0
 */

import { type Logger } from '@logtape/logtape';

import {
  type CorrelationContext,
  type ICorrelationContextAccessor,
  type ICorrelationContextFactory,
} from '../../domain/context';
import {
  ExceptionContext,
  type IAsyncCorrelationManager,
  type ICorrelationIdFactory,
  type ICorrelationManager,
  type OnException,
} from '../../domain/correlation';
import { ArgumentNullError } from '../../domain/errors';
import { type ICorrelationLogScope } from '../../domain/logging';
import { getDefaultCorrelationContextAccessor } from '../../infrastructure/context';
import {
  DEFAULT_LOGGER_CATEGORY,
  getCorrelateLogger,
  LogTapeCorrelationLogScope,
} from '../../infrastructure/logging';

import { enrichError } from './exception-enrichment';
import {
  asynchronousExecution,
  synchronousExecution,
  type ExecutionStrategy,
} from './execution-strategy';

/**
 * Second positional argument of `correlate` / `correlateAsync`: the work
 * when an id comes first, otherwise the exception handler.
 * @internal
 */
type WorkOrHandler<T, TReturn> = (() => TReturn) & OnException<T>;

/**
 * Optional collaborators of the manager.
 */
export interface CorrelationManagerOptions {
  /** Logger for scope diagnostics. Defaults to `['correlate', 'manager']`. */
  logger?: Logger;

  /** Log scope opened for every new correlation scope. Defaults to LogTape. */
  logScope?: ICorrelationLogScope;
}

/**
 * CorrelationManager - establishes, nests, reuses and tears down scopes.
 *
 * @remarks
 * **Scope resolution:**
 *
 * | call                      | ambient context | result                         |
 * |---------------------------|-----------------|--------------------------------|
 * | `correlate('X', work)`    | any             | new context `X`                |
 * | `correlate(work)`         | present         | the ambient context (reused)   |
 * | `correlate(work)`         | absent          | new context, generated id      |
 *
 * **Failures** are rethrown as the original object, tagged with the
 * correlation id under `error.data.CorrelationId` unless an inner scope
 * already tagged them. An `onException` handler can suppress the failure
 * by setting `isExceptionHandled` or assigning `result`.
 *
 * @example
 * ```typescript
 * const accessor = new CorrelationContextAccessor();
 * const ids = new GuidCorrelationIdFactory();
 * const manager = new CorrelationManager(
 *   new CorrelationContextFactory(accessor, ids),
 *   ids,
 *   accessor,
 * );
 *
 * await manager.correlateAsync(async () => {
 *   logger.info('handling message'); // tagged with a generated id
 *   await handle(message);
 * });
 * ```
 */
export class CorrelationManager implements ICorrelationManager, IAsyncCorrelationManager {
  private readonly accessor: ICorrelationContextAccessor;
  private readonly logger: Logger;
  private readonly logScope: ICorrelationLogScope;

  constructor(
    contextFactory: ICorrelationContextFactory,
    correlationIdFactory: ICorrelationIdFactory,
    accessor: ICorrelationContextAccessor,
    options?: CorrelationManagerOptions,
  );
  /**
   * @deprecated Pass the accessor explicitly. This form resolves the
   * process-wide accessor and otherwise behaves identically.
   */
  constructor(
    contextFactory: ICorrelationContextFactory,
    correlationIdFactory: ICorrelationIdFactory,
    logger?: Logger,
  );
  constructor(
    private readonly contextFactory: ICorrelationContextFactory,
    private readonly correlationIdFactory: ICorrelationIdFactory,
    accessorOrLogger?: ICorrelationContextAccessor | Logger,
    options: CorrelationManagerOptions = {},
  ) {
    const defaultLogger = (): Logger => getCorrelateLogger(DEFAULT_LOGGER_CATEGORY, 'manager');

    if (accessorOrLogger !== undefined && 'isolate' in accessorOrLogger) {
      this.accessor = accessorOrLogger;
      this.logger = options.logger ?? defaultLogger();
    } else {
      this.accessor = getDefaultCorrelationContextAccessor();
      this.logger = accessorOrLogger ?? defaultLogger();
    }

    this.logScope = options.logScope ?? new LogTapeCorrelationLogScope();
  }

  // ============================================================================
  // ICorrelationManager
  // ============================================================================

  correlate<T>(correlatedWork: () => T): T;
  correlate<T>(correlatedWork: () => T, onException: OnException<T> | undefined): T | undefined;
  correlate<T>(correlationId: string | undefined, correlatedWork: () => T): T;
  correlate<T>(
    correlationId: string | undefined,
    correlatedWork: () => T,
    onException: OnException<T> | undefined,
  ): T | undefined;
  correlate<T>(
    correlationIdOrWork: string | undefined | (() => T),
    workOrOnException?: WorkOrHandler<T, T>,
    onException?: OnException<T>,
  ): T | undefined {
    const strategy = synchronousExecution<T | undefined>();

    if (typeof correlationIdOrWork === 'function') {
      return this.execute<T, T | undefined>(strategy, undefined, correlationIdOrWork, workOrOnException);
    }

    if (typeof workOrOnException !== 'function') {
      throw new ArgumentNullError('correlatedWork');
    }

    return this.execute<T, T | undefined>(strategy, correlationIdOrWork, workOrOnException, onException);
  }

  // ============================================================================
  // IAsyncCorrelationManager
  // ============================================================================

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
  correlateAsync<T>(
    correlationIdOrTask: string | undefined | (() => Promise<T>),
    taskOrOnException?: WorkOrHandler<T, Promise<T>>,
    onException?: OnException<T>,
  ): Promise<T | undefined> {
    const strategy = asynchronousExecution<T | undefined>();

    if (typeof correlationIdOrTask === 'function') {
      return this.execute<T, Promise<T | undefined>>(
        strategy,
        undefined,
        correlationIdOrTask,
        taskOrOnException,
      );
    }

    if (typeof taskOrOnException !== 'function') {
      return Promise.reject(new ArgumentNullError('correlatedTask'));
    }

    return this.execute<T, Promise<T | undefined>>(
      strategy,
      correlationIdOrTask,
      taskOrOnException,
      onException,
    );
  }

  // ============================================================================
  // State Machine
  // ============================================================================

  /**
   * Resolve the scope, run the work through `strategy`, always dispose.
   * @private
   */
  private execute<T, TReturn>(
    strategy: ExecutionStrategy<T | undefined, TReturn>,
    correlationId: string | undefined,
    work: () => TReturn,
    onException: OnException<T> | undefined,
  ): TReturn {
    return this.accessor.isolate(() => {
      const ambient = this.accessor.correlationContext;
      const context = this.resolveContext(correlationId, ambient);
      const isNewScope = context !== ambient;

      const run = (): TReturn =>
        strategy.execute(
          work,
          (error) => this.handleException(context, error, onException),
          () => this.endScope(context, isNewScope),
        );

      if (!isNewScope) {
        return run();
      }

      return this.logScope.run(context.correlationId, () => {
        this.logger.debug('Correlation scope {correlationId} started.', {
          correlationId: context.correlationId,
        });
        return run();
      });
    });
  }

  /**
   * With no id and no ambient context the id comes from the manager's own
   * generator, not the context factory's. Callers that configure the two
   * separately get the manager's strategy for managed scopes.
   */
  private resolveContext(
    correlationId: string | undefined,
    ambient: CorrelationContext | undefined,
  ): CorrelationContext {
    if (correlationId) {
      return this.contextFactory.create(correlationId);
    }
    if (ambient) {
      return this.contextFactory.create();
    }
    return this.contextFactory.create(this.correlationIdFactory.create());
  }

  private handleException<T>(
    context: CorrelationContext,
    error: unknown,
    onException: OnException<T> | undefined,
  ): T | undefined {
    const active = this.accessor.correlationContext ?? context;
    enrichError(error, active.correlationId);

    if (!onException) {
      throw error;
    }

    const exceptionContext = new ExceptionContext<T>(active, error);
    try {
      onException(exceptionContext);
    } catch (handlerError) {
      enrichError(handlerError, active.correlationId);
      throw handlerError;
    }

    if (!exceptionContext.isExceptionHandled) {
      throw error;
    }

    this.logger.debug('Exception in correlation scope {correlationId} was handled.', {
      correlationId: active.correlationId,
    });
    return exceptionContext.result;
  }

  private endScope(context: CorrelationContext, isNewScope: boolean): void {
    if (!isNewScope) {
      return;
    }

    this.contextFactory.dispose(context);
    this.logger.debug('Correlation scope {correlationId} ended.', {
      correlationId: context.correlationId,
    });
  }
}
