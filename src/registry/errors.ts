/**
 * Error types raised by registration and dispatch.
 *
 * Every error the registry raises on its own behalf extends
 * `DispatchError`. Failures thrown by a registered implementation are
 * never wrapped in one of these.
 */

/**
 * Render a key for messages. Symbols print as `Symbol(description)`.
 */
export function formatKey(key: string | symbol): string {
  return typeof key === 'symbol' ? key.toString() : `'${key}'`;
}

/**
 * Base error class for registration and dispatch errors.
 */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DispatchError';
  }
}

/**
 * Error thrown when a key has never had an entry registered under it.
 */
export class UnknownKeyError extends DispatchError {
  readonly key: string | symbol;

  constructor(key: string | symbol) {
    super(`No entries have ever been registered under key ${formatKey(key)}`);
    this.name = 'UnknownKeyError';
    this.key = key;
  }
}

/**
 * Error thrown when entries exist for a key but none accepts the arguments.
 */
export class NoMatchError extends DispatchError {
  readonly key: string | symbol;
  readonly argumentTypes: string[];
  readonly candidateCount: number;

  constructor(key: string | symbol, argumentTypes: string[], candidateCount: number) {
    super(
      `No entry under key ${formatKey(key)} matches arguments (${argumentTypes.join(', ')}). ` +
        `Considered ${candidateCount} ${candidateCount === 1 ? 'entry' : 'entries'}`
    );
    this.name = 'NoMatchError';
    this.key = key;
    this.argumentTypes = argumentTypes;
    this.candidateCount = candidateCount;
  }
}

/**
 * One of the entries tied for the highest specificity.
 */
export interface AmbiguousCandidate {
  /** Formatted signature, e.g. `(Shape, number)` */
  signature: string;

  /** Registration sequence number of the entry */
  registrationOrder: number;
}

/**
 * Error thrown when two or more entries tie for the highest specificity.
 */
export class AmbiguousDispatchError extends DispatchError {
  readonly key: string | symbol;
  readonly candidates: AmbiguousCandidate[];

  constructor(key: string | symbol, candidates: AmbiguousCandidate[]) {
    const detail = candidates
      .map((c) => `${c.signature} [registered #${c.registrationOrder}]`)
      .join(', ');
    super(`Ambiguous dispatch for key ${formatKey(key)}. Tied candidates: ${detail}`);
    this.name = 'AmbiguousDispatchError';
    this.key = key;
    this.candidates = candidates;
  }

  /**
   * Formatted signatures of every tied candidate.
   */
  get signatures(): string[] {
    return this.candidates.map((c) => c.signature);
  }
}

/**
 * Error thrown when an identical signature is registered twice under one key
 * without requesting an override.
 */
export class DuplicateRegistrationError extends DispatchError {
  readonly key: string | symbol;
  readonly signature: string;

  constructor(key: string | symbol, signature: string) {
    super(
      `An entry with signature ${signature} is already registered under key ${formatKey(key)}. ` +
        'Pass { override: true } to replace it'
    );
    this.name = 'DuplicateRegistrationError';
    this.key = key;
    this.signature = signature;
  }
}

/**
 * Error thrown when a key, signature or implementation is malformed.
 */
export class InvalidRegistrationError extends DispatchError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRegistrationError';
  }
}
