/**
 * Signature and constraint types for dispatch entries.
 *
 * A signature is an ordered list of constraints, one per positional
 * argument. Each constraint is one of:
 * - exact: the argument's own type is the given type
 * - subtype: the argument is the given type or inherits from it
 * - predicate: an arbitrary test over the argument value
 *
 * Wherever a constraint is accepted, a class constructor is shorthand for
 * `subtype(ctor)` and a primitive tag such as `'number'` is shorthand for
 * `exact('number')`.
 *
 * @example
 * ```typescript
 * const signature = normalizeSignature([
 *   Shape,                             // subtype(Shape)
 *   exact('number'),
 *   predicate((v) => v !== undefined, 'defined'),
 * ]);
 *
 * formatSignature(signature); // "(Shape, number, predicate(defined))"
 * ```
 */

import { InvalidRegistrationError } from './errors.js';

/**
 * Identifier naming one logical dispatchable operation.
 */
export type Key = string | symbol;

/**
 * Runtime type tags for values that have no constructor of their own.
 */
export type PrimitiveTag =
  | 'string'
  | 'number'
  | 'bigint'
  | 'boolean'
  | 'symbol'
  | 'undefined'
  | 'null'
  | 'function';

export const PRIMITIVE_TAGS: readonly PrimitiveTag[] = [
  'string',
  'number',
  'bigint',
  'boolean',
  'symbol',
  'undefined',
  'null',
  'function',
];

/**
 * Any class, abstract or concrete.
 */
export type Constructor = abstract new (...args: never[]) => unknown;

/**
 * A type an argument can be checked against.
 */
export type TypeRef = Constructor | PrimitiveTag;

export interface ExactConstraint {
  readonly kind: 'exact';
  readonly type: TypeRef;
}

export interface SubtypeConstraint {
  readonly kind: 'subtype';
  readonly type: TypeRef;
}

export interface PredicateConstraint {
  readonly kind: 'predicate';
  readonly test: (value: unknown) => boolean;
  /** Name used in formatted signatures */
  readonly label: string;
}

/**
 * One positional constraint of a signature.
 */
export type Constraint = ExactConstraint | SubtypeConstraint | PredicateConstraint;

/**
 * Constraint input: a full constraint, or the constructor / tag shorthand.
 */
export type ConstraintSpec = Constraint | TypeRef;

/**
 * Normalized, frozen signature.
 */
export type Signature = readonly Constraint[];

/**
 * Signature input accepted by registration.
 */
export type SignatureSpec = readonly ConstraintSpec[];

export function isPrimitiveTag(value: unknown): value is PrimitiveTag {
  return PRIMITIVE_TAGS.some((tag) => tag === value);
}

/**
 * Check for something usable as a class: a function with a prototype object.
 * Arrow functions and methods have none.
 */
export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}

export function isTypeRef(value: unknown): value is TypeRef {
  return isPrimitiveTag(value) || isConstructor(value);
}

/**
 * Require the argument's own type to be `type`. Instances of subclasses do
 * not match.
 */
export function exact(type: TypeRef): ExactConstraint {
  if (!isTypeRef(type)) {
    throw new InvalidRegistrationError(`exact() expects a class or primitive tag, got ${describeInput(type)}`);
  }
  const constraint: ExactConstraint = { kind: 'exact', type };
  return Object.freeze(constraint);
}

/**
 * Accept `type` and anything inheriting from it.
 */
export function subtype(type: TypeRef): SubtypeConstraint {
  if (!isTypeRef(type)) {
    throw new InvalidRegistrationError(`subtype() expects a class or primitive tag, got ${describeInput(type)}`);
  }
  const constraint: SubtypeConstraint = { kind: 'subtype', type };
  return Object.freeze(constraint);
}

/**
 * Accept any argument for which `test` returns true.
 *
 * Two predicate constraints are the same constraint only when they wrap
 * the same function, so reuse the returned value (or the function) when
 * overriding an entry.
 */
export function predicate(test: (value: unknown) => boolean, label?: string): PredicateConstraint {
  if (typeof test !== 'function') {
    throw new InvalidRegistrationError(`predicate() expects a function, got ${describeInput(test)}`);
  }
  const constraint: PredicateConstraint = {
    kind: 'predicate',
    test,
    label: label ?? (test.name.length > 0 ? test.name : 'anonymous'),
  };
  return Object.freeze(constraint);
}

function acceptAny(_value: unknown): boolean {
  return true;
}

/**
 * Predicate constraint that accepts every value.
 */
export const ANY: PredicateConstraint = predicate(acceptAny, 'any');

/**
 * Normalize one constraint input.
 *
 * @throws InvalidRegistrationError for anything that is not a constraint,
 *   a class or a primitive tag
 */
export function normalizeConstraint(spec: ConstraintSpec): Constraint {
  if (typeof spec === 'string') {
    return exact(spec);
  }

  if (typeof spec === 'function') {
    if (!isConstructor(spec)) {
      throw new InvalidRegistrationError(
        `Plain function ${describeInput(spec)} is not a class; wrap tests in predicate()`
      );
    }
    return subtype(spec);
  }

  // JavaScript callers can hand over anything; re-check the shape.
  const candidate: unknown = spec;
  if (typeof candidate === 'object' && candidate !== null && 'kind' in candidate) {
    switch (spec.kind) {
      case 'exact':
        return exact(spec.type);
      case 'subtype':
        return subtype(spec.type);
      case 'predicate':
        return predicate(spec.test, spec.label);
    }
  }

  throw new InvalidRegistrationError(`Invalid constraint: ${describeInput(candidate)}`);
}

/**
 * Normalize a signature input into a frozen signature.
 */
export function normalizeSignature(spec: SignatureSpec): Signature {
  const input: unknown = spec;
  if (!Array.isArray(input)) {
    throw new InvalidRegistrationError(`Signature must be an array of constraints, got ${describeInput(input)}`);
  }
  return Object.freeze(spec.map((constraint) => normalizeConstraint(constraint)));
}

/**
 * Check whether two constraints are the same constraint.
 */
export function sameConstraint(a: Constraint, b: Constraint): boolean {
  if (a.kind === 'predicate' || b.kind === 'predicate') {
    return a.kind === 'predicate' && b.kind === 'predicate' && a.test === b.test;
  }
  return a.kind === b.kind && a.type === b.type;
}

/**
 * Check whether two signatures are identical: same arity and the same
 * constraint at every position.
 */
export function sameSignature(a: Signature, b: Signature): boolean {
  return a.length === b.length && a.every((constraint, i) => {
    const other = b[i];
    return other !== undefined && sameConstraint(constraint, other);
  });
}

export function typeName(type: TypeRef): string {
  if (typeof type === 'string') {
    return type;
  }
  return type.name.length > 0 ? type.name : 'anonymous';
}

export function formatConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'exact':
      return typeof constraint.type === 'string' ? constraint.type : `exact(${typeName(constraint.type)})`;
    case 'subtype':
      return typeof constraint.type === 'string'
        ? `subtype(${constraint.type})`
        : typeName(constraint.type);
    case 'predicate':
      return `predicate(${constraint.label})`;
  }
}

/**
 * Render a signature for messages and introspection.
 *
 * @example
 * formatSignature(normalizeSignature([Circle, exact(Square), 'number']));
 * // "(Circle, exact(Square), number)"
 */
export function formatSignature(signature: Signature): string {
  return `(${signature.map(formatConstraint).join(', ')})`;
}

function describeInput(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'function') {
    return value.name.length > 0 ? value.name : 'anonymous function';
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return typeof value;
}
