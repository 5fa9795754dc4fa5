/**
 * Registration and dispatch-resolution engine.
 *
 * Key components:
 *
 * - `Registry`: owns the key -> entries mapping; register, unregister, lookup, dispatch
 * - `Signature` / `Constraint`: per-argument type and predicate constraints
 * - `matchEntry` / `compareSpecificity`: applicability and ranking of one entry
 * - `resolve`: picks the single most specific entry or fails
 * - `invoke`: calls the chosen implementation, with optional tracing
 * - `DispatchHandle`: unregisters exactly the entry it was issued for
 *
 * @example Basic usage
 * ```typescript
 * import { Registry, exact } from './registry';
 *
 * const registry = new Registry<string>({ name: 'formatters' });
 * registry.register('format', ['number'], (n: number) => n.toFixed(2));
 * registry.register('format', [exact(Date)], (d: Date) => d.toISOString());
 *
 * registry.dispatch('format', 3); // "3.00"
 * ```
 *
 * @example Predicates
 * ```typescript
 * const isNegative = predicate((v) => typeof v === 'number' && v < 0, 'negative');
 * registry.register('format', [isNegative], (n: number) => `(${Math.abs(n).toFixed(2)})`);
 *
 * // 'number' is an exact match and outranks the predicate, so this is
 * // still "-3.00". Predicates win only where no typed entry applies.
 * registry.dispatch('format', -3);
 * ```
 */

// Entries and handles
export {
  cloneMetadata,
  createEntry,
  DispatchHandle,
  describeEntry,
  type Entry,
  type EntryDescription,
  type EntryMetadata,
  type Implementation,
} from './entry.js';
// Errors
export {
  type AmbiguousCandidate,
  AmbiguousDispatchError,
  DispatchError,
  DuplicateRegistrationError,
  formatKey,
  InvalidRegistrationError,
  NoMatchError,
  UnknownKeyError,
} from './errors.js';
// Invocation
export { type InvokeOptions, invoke } from './invoker.js';
// Matching
export {
  comparePositionScores,
  compareSpecificity,
  describeArgument,
  matchConstraint,
  matchEntry,
  matchSignature,
  MatchTier,
  type PositionScore,
  prototypeDistance,
  type Specificity,
  typeTagOf,
} from './matcher.js';
// Registry
export { type RegisterOptions, Registry } from './registry.js';
// Resolution
export { type RankedCandidate, rankCandidates, resolve } from './resolver.js';
// Signatures
export {
  ANY,
  type Constraint,
  type ConstraintSpec,
  type Constructor,
  type ExactConstraint,
  exact,
  formatConstraint,
  formatSignature,
  isConstructor,
  isPrimitiveTag,
  isTypeRef,
  type Key,
  normalizeConstraint,
  normalizeSignature,
  PRIMITIVE_TAGS,
  type PredicateConstraint,
  type PrimitiveTag,
  predicate,
  sameConstraint,
  sameSignature,
  type Signature,
  type SignatureSpec,
  type SubtypeConstraint,
  subtype,
  type TypeRef,
  typeName,
} from './signature.js';
