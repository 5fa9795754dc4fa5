/**
 * Dispatch resolution: pick the single most specific applicable entry.
 *
 * Resolution process:
 * 1. Match every entry against the arguments and drop the ones that do not apply
 * 2. Fail with NoMatchError if nothing applies
 * 3. Order the rest by specificity, most specific first
 * 4. Fail with AmbiguousDispatchError if more than one entry shares the top spot
 * 5. Otherwise return the winner
 *
 * Ties are configuration errors and are never broken by registration
 * order. An override registration removes the entry it replaces, so a
 * replaced entry never takes part in a tie.
 *
 * @example
 * ```typescript
 * const entries = registry.lookup('area');
 * const winner = resolve('area', entries, [new Circle(2)]);
 * winner.implementation(new Circle(2));
 * ```
 */

import { createLogger } from '../logging/index.js';
import type { Entry } from './entry.js';
import { AmbiguousDispatchError, NoMatchError } from './errors.js';
import { compareSpecificity, describeArgument, matchEntry, type Specificity } from './matcher.js';
import { formatSignature, type Key } from './signature.js';

const log = createLogger({ component: 'resolver' });

/**
 * An applicable entry with its specificity for one argument list.
 */
export interface RankedCandidate<TResult = unknown> {
  entry: Entry<TResult>;
  specificity: Specificity;
}

/**
 * Match and order the applicable entries, most specific first.
 *
 * Entries with equal specificity keep their relative registration order.
 *
 * @param entries - Entries for one key, in registration order
 * @param args - Concrete argument list
 */
export function rankCandidates<TResult>(
  entries: readonly Entry<TResult>[],
  args: readonly unknown[]
): RankedCandidate<TResult>[] {
  const candidates: RankedCandidate<TResult>[] = [];
  for (const entry of entries) {
    const specificity = matchEntry(entry, args);
    if (specificity) {
      candidates.push({ entry, specificity });
    }
  }

  return candidates.sort((a, b) => compareSpecificity(b.specificity, a.specificity));
}

/**
 * Resolve the entry to invoke for an argument list.
 *
 * @param key - Key the entries were looked up under (for error reporting)
 * @param entries - Entries for the key, in registration order
 * @param args - Concrete argument list
 * @throws NoMatchError if no entry applies
 * @throws AmbiguousDispatchError if several entries tie for most specific
 */
export function resolve<TResult>(
  key: Key,
  entries: readonly Entry<TResult>[],
  args: readonly unknown[]
): Entry<TResult> {
  const ranked = rankCandidates(entries, args);
  const [best, ...rest] = ranked;

  if (!best) {
    const argumentTypes = args.map(describeArgument);
    log.debug('No entry matches arguments', {
      operation: 'resolve',
      key: String(key),
      argument_types: argumentTypes.join(', '),
      candidates: entries.length,
    });
    throw new NoMatchError(key, argumentTypes, entries.length);
  }

  const tied = [best];
  for (const candidate of rest) {
    if (compareSpecificity(candidate.specificity, best.specificity) !== 0) {
      break;
    }
    tied.push(candidate);
  }

  if (tied.length > 1) {
    const candidates = tied.map((c) => ({
      signature: formatSignature(c.entry.signature),
      registrationOrder: c.entry.sequence,
    }));
    log.debug('Ambiguous dispatch', {
      operation: 'resolve',
      key: String(key),
      tied: candidates.map((c) => c.signature).join(', '),
    });
    throw new AmbiguousDispatchError(key, candidates);
  }

  return best.entry;
}
