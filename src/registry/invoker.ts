/**
 * Invocation of a resolved entry.
 *
 * Calls the entry's implementation with the dispatch arguments and hands
 * back whatever it returns, a Promise included, untouched. A synchronous
 * throw is rethrown as the same value. There is no retry, timeout or
 * suppression; callers needing bounded latency wrap dispatch themselves.
 *
 * When an emitter with dispatch listeners is supplied the invocation is
 * traced:
 *
 *   dispatch.selected  -> before the call
 *   dispatch.returned  -> after a normal return
 *   dispatch.failed    -> after a throw, before it propagates
 *
 * @example
 * ```typescript
 * const entry = resolve('area', registry.lookup('area'), [circle]);
 * const area = invoke(entry, [circle], { registry: 'shapes', events });
 * ```
 */

import type { RegistryEventEmitter } from '../events/event-emitter.js';
import { createLogger, isLevelEnabled } from '../logging/index.js';
import type { Entry, EntryMetadata } from './entry.js';
import { describeArgument } from './matcher.js';
import { formatSignature } from './signature.js';

const log = createLogger({ component: 'invoker' });

export interface InvokeOptions {
  /** Registry name reported in trace events (default: "default") */
  registry?: string;

  /** Emitter receiving dispatch.* events; no tracing when omitted */
  events?: RegistryEventEmitter;

  /** Extra trailing argument, passed after the dispatch arguments */
  bound?: EntryMetadata;
}

/**
 * Invoke an entry's implementation.
 *
 * @param entry - The resolved entry
 * @param args - Arguments the entry was resolved for
 * @param options - Tracing and bound-argument options
 * @returns The implementation's return value, unchanged
 */
export function invoke<TResult>(
  entry: Entry<TResult>,
  args: readonly unknown[],
  options: InvokeOptions = {}
): TResult {
  const registry = options.registry ?? 'default';
  const events = options.events?.hasDispatchListeners() ? options.events : undefined;
  const callArgs = options.bound === undefined ? [...args] : [...args, options.bound];

  events?.emitSelected(registry, entry, args.map(describeArgument));
  if (isLevelEnabled('trace')) {
    log.trace('Invoking entry', {
      operation: 'invoke',
      registry,
      key: String(entry.key),
      signature: formatSignature(entry.signature),
    });
  }

  const startedAt = events ? Date.now() : 0;
  let result: TResult;
  try {
    result = entry.implementation(...callArgs);
  } catch (error) {
    events?.emitFailed(registry, entry, error, Date.now() - startedAt);
    throw error;
  }

  events?.emitReturned(registry, entry, result, Date.now() - startedAt);
  return result;
}
