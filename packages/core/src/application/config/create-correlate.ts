/**
 * @fileoverview createCorrelate - Composition Root
 *
 * @packageDocumentation
 * @module @correlate-js/core/application/config
 * @license Apache-2.0
 *
 * Wires the accessor, context factory, id factory, log scope and manager
 * from validated options. Applications that use a DI container can register
 * the returned instances as singletons.
 *
 * @version 1.0.0
 */

import { type ICorrelationContextAccessor } from '../../domain/context';
import { type ICorrelationIdFactory } from '../../domain/correlation';
import { type ICorrelationLogScope } from '../../domain/logging';
import {
  CorrelationContextFactory,
  getDefaultCorrelationContextAccessor,
} from '../../infrastructure/context';
import {
  GuidCorrelationIdFactory,
  TraceIdentifierCorrelationIdFactory,
} from '../../infrastructure/ids';
import { getCorrelateLogger, LogTapeCorrelationLogScope } from '../../infrastructure/logging';
import { CorrelationManager } from '../correlation';

import {
  parseCorrelateOptions,
  type CorrelateOptions,
  type CorrelateOptionsInput,
} from './correlate-options';

/**
 * The wired components.
 */
export interface Correlate {
  readonly options: CorrelateOptions;
  readonly accessor: ICorrelationContextAccessor;
  readonly correlationIdFactory: ICorrelationIdFactory;
  readonly contextFactory: CorrelationContextFactory;
  readonly logScope: ICorrelationLogScope;
  readonly manager: CorrelationManager;
}

/**
 * Build the id factory selected by `options`.
 */
export function createCorrelationIdFactory(
  generator: CorrelateOptions['correlationIdGenerator'],
): ICorrelationIdFactory {
  switch (generator) {
    case 'guid':
      return new GuidCorrelationIdFactory();
    case 'traceIdentifier':
      return new TraceIdentifierCorrelationIdFactory();
  }
}

/**
 * Create a fully wired set of correlation components.
 *
 * @param input - Options; validated with {@link parseCorrelateOptions}
 * @throws InvalidCorrelateOptionsError if the options are invalid
 *
 * @example
 * ```typescript
 * const { manager, accessor } = createCorrelate({ correlationIdGenerator: 'traceIdentifier' });
 *
 * await manager.correlateAsync(async () => {
 *   console.log(accessor.correlationContext?.correlationId); // e.g. '0HMVD1A7QK5L8'
 * });
 * ```
 */
export function createCorrelate(input?: CorrelateOptionsInput): Correlate {
  const options = parseCorrelateOptions(input);

  const accessor = getDefaultCorrelationContextAccessor();
  const correlationIdFactory = createCorrelationIdFactory(options.correlationIdGenerator);
  const contextFactory = new CorrelationContextFactory(accessor, correlationIdFactory);
  const logScope = new LogTapeCorrelationLogScope(options.loggingScopeKey);
  const manager = new CorrelationManager(contextFactory, correlationIdFactory, accessor, {
    logger: getCorrelateLogger(options.loggerCategory, 'manager'),
    logScope,
  });

  return { options, accessor, correlationIdFactory, contextFactory, logScope, manager };
}
