/**
 * Applicability checks and specificity scoring.
 *
 * Every function here is pure. A signature matches an argument list when
 * the arity is equal and every argument satisfies its positional
 * constraint; the result is a specificity vector with one score per
 * position.
 *
 * Scores rank by tier first (exact > subtype > predicate), then by
 * prototype-chain distance within the subtype tier (nearer is more
 * specific). Vectors compare lexicographically from the left: the first
 * position that differs decides, so `(exact, predicate)` outranks
 * `(predicate, exact)` even though both contain one exact match.
 */

import type { Entry } from './entry.js';
import type { Constraint, Constructor, PrimitiveTag, Signature } from './signature.js';

/**
 * How an argument satisfied its constraint.
 */
export enum MatchTier {
  /** Accepted by a predicate only */
  PREDICATE = 0,

  /** The argument inherits from the constraint type (or is it) */
  SUBTYPE = 1,

  /** The argument's own type is the constraint type */
  EXACT = 2,
}

/**
 * Match quality at one argument position.
 */
export interface PositionScore {
  readonly tier: MatchTier;

  /** Prototype steps between the argument and the constraint type */
  readonly distance: number;
}

/**
 * One score per argument position.
 */
export type Specificity = readonly PositionScore[];

/**
 * Runtime type tag of a value. Objects that are not functions report
 * `'object'`, which no primitive tag matches.
 */
export function typeTagOf(value: unknown): PrimitiveTag | 'object' {
  if (value === null) {
    return 'null';
  }
  return typeof value;
}

/**
 * Count the prototype steps from `value` to `type.prototype`.
 *
 * @returns 0 when `value` is a direct instance, the number of steps for an
 *   instance of a subclass, or null when `type` is not on the chain (always
 *   null for primitives)
 */
export function prototypeDistance(value: unknown, type: Constructor): number | null {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return null;
  }

  const target: unknown = type.prototype;
  let distance = 0;
  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null) {
    if (proto === target) {
      return distance;
    }
    distance += 1;
    proto = Object.getPrototypeOf(proto);
  }
  return null;
}

/**
 * Check a single argument against a single constraint.
 *
 * Predicates are caller code: if one throws, the error propagates.
 *
 * @returns The position score, or null when the argument is rejected
 */
export function matchConstraint(constraint: Constraint, value: unknown): PositionScore | null {
  switch (constraint.kind) {
    case 'exact': {
      if (typeof constraint.type === 'string') {
        return typeTagOf(value) === constraint.type ? { tier: MatchTier.EXACT, distance: 0 } : null;
      }
      return prototypeDistance(value, constraint.type) === 0 ? { tier: MatchTier.EXACT, distance: 0 } : null;
    }
    case 'subtype': {
      if (typeof constraint.type === 'string') {
        return typeTagOf(value) === constraint.type ? { tier: MatchTier.SUBTYPE, distance: 0 } : null;
      }
      const distance = prototypeDistance(value, constraint.type);
      return distance === null ? null : { tier: MatchTier.SUBTYPE, distance };
    }
    case 'predicate':
      return constraint.test(value) ? { tier: MatchTier.PREDICATE, distance: 0 } : null;
  }
}

/**
 * Match an argument list against a signature.
 *
 * @returns The specificity vector, or null when the signature does not apply
 */
export function matchSignature(signature: Signature, args: readonly unknown[]): Specificity | null {
  if (args.length !== signature.length) {
    return null;
  }

  const scores: PositionScore[] = [];
  for (const [position, constraint] of signature.entries()) {
    const score = matchConstraint(constraint, args[position]);
    if (!score) {
      return null;
    }
    scores.push(score);
  }
  return scores;
}

/**
 * Match an argument list against an entry's signature.
 */
export function matchEntry(entry: Pick<Entry, 'signature'>, args: readonly unknown[]): Specificity | null {
  return matchSignature(entry.signature, args);
}

/**
 * Compare two position scores.
 *
 * @returns Positive when `a` is more specific, negative when `b` is, 0 on a tie
 */
export function comparePositionScores(a: PositionScore, b: PositionScore): number {
  if (a.tier !== b.tier) {
    return a.tier - b.tier;
  }
  return b.distance - a.distance;
}

/**
 * Compare two specificity vectors lexicographically, left to right.
 *
 * @returns Positive when `a` is more specific, negative when `b` is, 0 when
 *   they are equal at every position
 */
export function compareSpecificity(a: Specificity, b: Specificity): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) {
      break;
    }
    const cmp = comparePositionScores(left, right);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return 0;
}

/**
 * Describe an argument's runtime type for diagnostics: the constructor
 * name for objects, the tag for everything else.
 */
export function describeArgument(value: unknown): string {
  const tag = typeTagOf(value);
  if (tag !== 'object') {
    return tag;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) {
    return 'Object(null prototype)';
  }
  const ctor: unknown = 'constructor' in proto ? proto.constructor : undefined;
  if (typeof ctor === 'function' && ctor.name.length > 0) {
    return ctor.name;
  }
  return 'Object';
}
